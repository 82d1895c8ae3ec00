import { describe, expect, it } from 'vitest';
import { rotationWindow } from './rotation-window';

const ordering = [1, 3, 2, 4];

describe('Rotation window', () => {
    describe('rotationWindow', () => {
        it('takes items starting at the position', () => {
            expect(rotationWindow(ordering, 0, 2)).toEqual([1, 3]);
            expect(rotationWindow(ordering, 1, 2)).toEqual([3, 2]);
            expect(rotationWindow(ordering, 2, 2)).toEqual([2, 4]);
        });

        it('wraps around the end', () => {
            expect(rotationWindow(ordering, 3, 2)).toEqual([4, 1]);
            expect(rotationWindow(ordering, 2, 4)).toEqual([2, 4, 1, 3]);
        });

        it('returns distinct items for every window size up to the length', () => {
            for (let take = 1; take <= ordering.length; take++) {
                for (let position = 0; position < 2 * ordering.length; position++) {
                    const window = rotationWindow(ordering, position, take);
                    expect(window).toHaveLength(take);
                    expect(new Set(window).size).toBe(take);
                    window.forEach((item) => expect(ordering).toContain(item));
                }
            }
        });

        it('repeats with a period of the ordering length', () => {
            for (let position = 0; position < 10; position++) {
                expect(rotationWindow(ordering, position + ordering.length, 3)).toEqual(
                    rotationWindow(ordering, position, 3),
                );
            }
        });

        it('works on a single item', () => {
            expect(rotationWindow([5], 7, 1)).toEqual([5]);
        });
    });
});
