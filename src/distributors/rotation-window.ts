/**
 * Takes `take` items from `items` starting at `position`, wrapping around at the end.
 * Expects `1 <= take <= items.length`, so the window never repeats an item.
 */
export const rotationWindow = <T>(items: T[], position: number, take: number) =>
    Array.from({ length: take }, (_, i) => items[(position + i) % items.length]);
