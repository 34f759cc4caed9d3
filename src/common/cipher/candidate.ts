/**
 * One guess produced by a brute-force routine.
 */
export interface Candidate<K> {
    key: K
    plaintext: string
}
