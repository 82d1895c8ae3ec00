/**
 * Merges the lists by taking the i-th item of every list that still has one, in list order, for i = 0, 1, ...
 *
 * With rack groups as input, neighbouring items come from different racks for as long as at least two racks have
 * brokers left.
 */
export const interleave = <T>(lists: T[][]) => {
    const rounds = Math.max(0, ...lists.map((list) => list.length));
    const result: T[] = [];
    for (let i = 0; i < rounds; i++) {
        for (const list of lists) {
            if (i < list.length) result.push(list[i]);
        }
    }
    return result;
};
