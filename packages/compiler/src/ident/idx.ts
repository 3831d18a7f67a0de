import {
  IDENT_ATTRIBUTE_BITS,
  IDENT_ATTRIBUTE_MASK,
  packIdentAttributes,
  unpackIdentAttributes,
  type IdentAttributes,
} from "./attributes.js";

/**
 * Handle for one identifier occurrence. An unsigned 32-bit integer: the low
 * three bits hold the packed attributes, the high 29 bits the occurrence
 * index in the owning store.
 */
export type IdentIdx = number;

export const IDENT_INDEX_BITS = 32 - IDENT_ATTRIBUTE_BITS;

/** Number of occurrence indices a handle can address (2^29). */
export const IDENT_INDEX_LIMIT = 2 ** IDENT_INDEX_BITS;

/** Like {@link packIdentIdx}, with the attributes already packed. */
export const packIdentIdxBits = (index: number, bits: number): IdentIdx => {
  if (!Number.isInteger(index) || index < 0 || index >= IDENT_INDEX_LIMIT) {
    throw new RangeError(`identifier index ${index} does not fit in a handle`);
  }

  return ((index << IDENT_ATTRIBUTE_BITS) | (bits & IDENT_ATTRIBUTE_MASK)) >>> 0;
};

export const packIdentIdx = (
  index: number,
  attributes: IdentAttributes
): IdentIdx => packIdentIdxBits(index, packIdentAttributes(attributes));

export const identIndexOf = (idx: IdentIdx): number =>
  idx >>> IDENT_ATTRIBUTE_BITS;

export const identAttributeBitsOf = (idx: IdentIdx): number =>
  idx & IDENT_ATTRIBUTE_MASK;

export const identAttributesOf = (idx: IdentIdx): IdentAttributes =>
  unpackIdentAttributes(idx);
