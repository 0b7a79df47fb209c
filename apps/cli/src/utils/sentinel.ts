// usize::MAX from the generator. JSON numbers are doubles, so the wire value
// 18446744073709551615 parses to 2**64; both spellings compare equal here.
export const SENTINEL_INDEX = 2 ** 64 - 1;

export const isSentinel = (index: number): boolean => index === SENTINEL_INDEX;

export const withoutSentinels = (indices: readonly number[]): number[] =>
  indices.filter((i) => !isSentinel(i));
