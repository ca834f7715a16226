/**
 * Sequence-matching similarity in the range 0..1.
 *
 * ratio = 2 * M / (|a| + |b|), where M counts the characters of the longest
 * common block plus, recursively, the blocks to its left and right.
 * Two empty strings are identical (1).
 */
export function similarityRatio(a: string, b: string): number {
    const total = a.length + b.length;
    if (total === 0) return 1;
    return (2 * matchingCharacters(a, b)) / total;
}

function matchingCharacters(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0;

    const { startA, startB, length } = longestCommonBlock(a, b);
    if (length === 0) return 0;

    return (
        length +
        matchingCharacters(a.slice(0, startA), b.slice(0, startB)) +
        matchingCharacters(a.slice(startA + length), b.slice(startB + length))
    );
}

/**
 * Longest common substring; earliest in `a`, then earliest in `b`, on ties
 */
function longestCommonBlock(a: string, b: string): { startA: number; startB: number; length: number } {
    let best = { startA: 0, startB: 0, length: 0 };
    // prev[j] = length of the common suffix of a[..i-1] and b[..j-1]
    let prev = new Array<number>(b.length + 1).fill(0);

    for (let i = 1; i <= a.length; i++) {
        const curr = new Array<number>(b.length + 1).fill(0);
        for (let j = 1; j <= b.length; j++) {
            if (a[i - 1] !== b[j - 1]) continue;
            curr[j] = prev[j - 1] + 1;
            if (curr[j] > best.length) {
                best = { startA: i - curr[j], startB: j - curr[j], length: curr[j] };
            }
        }
        prev = curr;
    }

    return best;
}
