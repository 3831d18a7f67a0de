import type { SourceSpan } from "../diagnostics/index.js";
import { PRIMARY_MODULE_IDX, type ModuleIdx } from "../modules/ids.js";
import {
  incrementCompilerPerfCounter,
  logCompilerPerfSummary,
} from "../perf.js";
import {
  hasIdentProblems,
  identFromText,
  packIdentAttributes,
  unpackIdentAttributes,
  type Ident,
  type IdentAttributes,
} from "./attributes.js";
import { IdentCapacityError } from "./errors.js";
import {
  IDENT_INDEX_LIMIT,
  identIndexOf,
  packIdentIdxBits,
  type IdentIdx,
} from "./idx.js";
import { IdentNameInterner, type IdentTextId } from "./interner.js";
import type { IdentProblemSink } from "./problems.js";

export type IdentStoreOptions = {
  /**
   * Maximum number of occurrences the store accepts. Defaults to, and may not
   * exceed, the number of indices a handle can address.
   */
  capacity?: number;
};

// u32 max is 4294967295, ten digits.
const MAX_UNIQUE_NAME_DIGITS = 10;
const MAX_UNIQUE_NAME = 0xffff_ffff;
const DIGIT_ZERO = 0x30;

const uniqueNameDecoder = new TextDecoder();

const resolveCapacity = (capacity: number | undefined): number => {
  if (capacity === undefined) return IDENT_INDEX_LIMIT;
  if (
    !Number.isInteger(capacity) ||
    capacity < 1 ||
    capacity > IDENT_INDEX_LIMIT
  ) {
    throw new RangeError(
      `identifier store capacity must be an integer between 1 and ${IDENT_INDEX_LIMIT}, got ${capacity}`
    );
  }
  return capacity;
};

/**
 * Identifier occurrences of one compilation unit.
 *
 * Every insert gets a fresh occurrence index, even when the text was seen
 * before; the text itself is shared through the interner. Regions and
 * exposing modules are per occurrence and live in side tables indexed by
 * that occurrence index, which is also the index packed into the handle.
 */
export class IdentStore<R = SourceSpan> {
  readonly capacity: number;
  private readonly interner = new IdentNameInterner();
  private readonly textIds: IdentTextId[] = [];
  private readonly attributeBits: number[] = [];
  private readonly regions: R[] = [];
  private readonly exposingModules: ModuleIdx[] = [];
  private readonly occurrencesByText: IdentIdx[][] = [];
  private readonly uniqueNameScratch = new Uint8Array(MAX_UNIQUE_NAME_DIGITS);
  private nextUniqueName = 0;

  constructor(options: IdentStoreOptions = {}) {
    this.capacity = resolveCapacity(options.capacity);
  }

  get occurrenceCount(): number {
    return this.textIds.length;
  }

  get distinctTextCount(): number {
    return this.interner.size;
  }

  insert(text: string, region: R, problems: IdentProblemSink<R>): IdentIdx {
    return this.insertIdent(identFromText(text), region, problems);
  }

  insertIdent(
    ident: Ident,
    region: R,
    problems: IdentProblemSink<R>
  ): IdentIdx {
    this.ensureCapacity();

    if (hasIdentProblems(ident.problems)) {
      problems.report({
        kind: "IdentIssue",
        problems: { ...ident.problems },
        region,
      });
      incrementCompilerPerfCounter("ident.problems");
    }

    return this.append(
      ident.rawText,
      packIdentAttributes(ident.attributes),
      region
    );
  }

  /**
   * Interns a fresh synthetic name: the decimal rendering of a per-store
   * counter, so names never repeat within one store.
   */
  genUnique(region: R): IdentIdx {
    this.ensureCapacity();
    if (this.nextUniqueName > MAX_UNIQUE_NAME) {
      throw new RangeError("identifier store ran out of unique names");
    }

    const name = this.renderUniqueName(this.nextUniqueName);
    this.nextUniqueName += 1;
    incrementCompilerPerfCounter("ident.unique");
    return this.append(name, 0, region);
  }

  sameText(first: IdentIdx, second: IdentIdx): boolean {
    return this.interner.sameText(
      this.textIdOf(first),
      this.textIdOf(second)
    );
  }

  /**
   * Handles of every occurrence spelled exactly `text`, in insertion order.
   * Occurrences inserted while the iterator is live are not yielded.
   */
  *lookup(text: string): IterableIterator<IdentIdx> {
    for (const textId of this.interner.lookup(text)) {
      const occurrences = this.occurrencesByText[textId];
      if (!occurrences) continue;
      const end = occurrences.length;
      for (let index = 0; index < end; index += 1) {
        yield occurrences[index];
      }
    }
  }

  textOf(idx: IdentIdx): string {
    return this.interner.textOf(this.textIdOf(idx));
  }

  attributesOf(idx: IdentIdx): IdentAttributes {
    return unpackIdentAttributes(this.attributeBits[this.occurrenceOf(idx)]);
  }

  regionOf(idx: IdentIdx): R {
    return this.regions[this.occurrenceOf(idx)];
  }

  exposingModuleOf(idx: IdentIdx): ModuleIdx {
    return this.exposingModules[this.occurrenceOf(idx)];
  }

  /**
   * Records the module that exposes this occurrence. Call it when the
   * identifier is first resolved, before any later pass reads
   * {@link exposingModuleOf}; until then the primary module is reported.
   */
  setExposingModule(idx: IdentIdx, module: ModuleIdx): void {
    this.exposingModules[this.occurrenceOf(idx)] = module;
  }

  /** Logs the store's size and the perf counters once the unit is done. */
  logPerfSummary(unit: string): void {
    logCompilerPerfSummary({
      unit,
      occurrences: this.occurrenceCount,
      distinctTexts: this.distinctTextCount,
    });
  }

  private ensureCapacity(): void {
    if (this.textIds.length >= this.capacity) {
      throw new IdentCapacityError(this.capacity);
    }
  }

  private append(text: string, bits: number, region: R): IdentIdx {
    const occurrence = this.textIds.length;
    const knownTexts = this.interner.size;
    const textId = this.interner.insert(text);
    const idx = packIdentIdxBits(occurrence, bits);

    this.textIds.push(textId);
    this.attributeBits.push(bits);
    this.regions.push(region);
    this.exposingModules.push(PRIMARY_MODULE_IDX);

    const occurrences = this.occurrencesByText[textId];
    if (occurrences) {
      occurrences.push(idx);
    } else {
      this.occurrencesByText[textId] = [idx];
    }

    incrementCompilerPerfCounter("ident.occurrences");
    incrementCompilerPerfCounter(
      this.interner.size > knownTexts
        ? "ident.texts.interned"
        : "ident.texts.reused"
    );
    return idx;
  }

  private occurrenceOf(idx: IdentIdx): number {
    const occurrence = identIndexOf(idx);
    if (occurrence >= this.textIds.length) {
      throw new RangeError(`identifier occurrence ${occurrence} does not exist`);
    }

    return occurrence;
  }

  private textIdOf(idx: IdentIdx): IdentTextId {
    return this.textIds[this.occurrenceOf(idx)];
  }

  private renderUniqueName(value: number): string {
    const digits = this.uniqueNameScratch;
    let start = digits.length;
    let remaining = value;

    do {
      start -= 1;
      digits[start] = DIGIT_ZERO + (remaining % 10);
      remaining = Math.floor(remaining / 10);
    } while (remaining > 0);

    return uniqueNameDecoder.decode(digits.subarray(start));
  }
}
