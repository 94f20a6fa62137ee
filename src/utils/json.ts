/** JSON.stringify replacer that writes bigint values as decimal strings. */
export const bigintReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

export const toJson = (value: unknown, space?: number): string => JSON.stringify(value, bigintReplacer, space);
