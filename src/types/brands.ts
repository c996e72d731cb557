// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;
export type Address = Brand<Hex, "Address">;
export type Amount = bigint;

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export const isAddress = (s: string): boolean => ADDRESS_RE.test(s);

/** Normalises to lower case so equal accounts compare equal as map keys. */
export const asAddress = (s: string): Address => {
  if (!isAddress(s)) throw new TypeError(`invalid address: ${s}`);
  return s.toLowerCase() as Address;
};

export const ZERO_ADDRESS: Address = asAddress(`0x${"00".repeat(20)}`);
