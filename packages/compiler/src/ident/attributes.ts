/**
 * Naming conventions carried by an identifier's spelling.
 *
 * - `main!` is effectful
 * - `_unused` is ignored
 * - `count_` is reassignable
 *
 * The flags are derived from the text alone and are packed into the low
 * three bits of every identifier handle.
 */
export interface IdentAttributes {
  effectful: boolean;
  ignored: boolean;
  reassignable: boolean;
}

/** Style problems found in an identifier. Reported as warnings, never fatal. */
export interface IdentProblems {
  subsequentUnderscores: boolean;
}

export interface Ident {
  rawText: string;
  attributes: IdentAttributes;
  problems: IdentProblems;
}

export const EFFECTFUL_SUFFIX = "!";
export const IGNORED_PREFIX = "_";
export const REASSIGNABLE_SUFFIX = "_";

const EFFECTFUL_BIT = 0b001;
const IGNORED_BIT = 0b010;
const REASSIGNABLE_BIT = 0b100;

export const IDENT_ATTRIBUTE_BITS = 3;
export const IDENT_ATTRIBUTE_MASK = 0b111;

export const NO_IDENT_ATTRIBUTES: Readonly<IdentAttributes> = Object.freeze({
  effectful: false,
  ignored: false,
  reassignable: false,
});

export const deriveIdentAttributes = (text: string): IdentAttributes => ({
  effectful: text.endsWith(EFFECTFUL_SUFFIX),
  ignored: text.startsWith(IGNORED_PREFIX),
  // A lone `_` is the ignored wildcard.
  reassignable: text.length > 1 && text.endsWith(REASSIGNABLE_SUFFIX),
});

export const deriveIdentProblems = (text: string): IdentProblems => ({
  subsequentUnderscores: text.includes("__"),
});

export const hasIdentProblems = (problems: IdentProblems): boolean =>
  problems.subsequentUnderscores;

/** Names of the set problem flags, in declaration order. */
export const describeIdentProblems = (problems: IdentProblems): string[] => {
  const names: string[] = [];
  if (problems.subsequentUnderscores) names.push("subsequent underscores");
  return names;
};

export const identFromText = (text: string): Ident => ({
  rawText: text,
  attributes: deriveIdentAttributes(text),
  problems: deriveIdentProblems(text),
});

export const packIdentAttributes = (attributes: IdentAttributes): number =>
  (attributes.effectful ? EFFECTFUL_BIT : 0) |
  (attributes.ignored ? IGNORED_BIT : 0) |
  (attributes.reassignable ? REASSIGNABLE_BIT : 0);

export const unpackIdentAttributes = (bits: number): IdentAttributes => {
  const masked = bits & IDENT_ATTRIBUTE_MASK;
  return {
    effectful: (masked & EFFECTFUL_BIT) !== 0,
    ignored: (masked & IGNORED_BIT) !== 0,
    reassignable: (masked & REASSIGNABLE_BIT) !== 0,
  };
};
