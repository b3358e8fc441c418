"use strict";

import { fail } from "../errors.js";
import type { DecodeFailure } from "../errors.js";
import {
  ELF_TYPE,
  ELF_TYPE_RANGES,
  PF_MASKOS,
  PF_MASKPROC,
  SECTION_FLAGS,
  SECTION_TYPES,
  SECTION_TYPE_RANGES,
  SEGMENT_FLAGS,
  SEGMENT_TYPES,
  SEGMENT_TYPE_RANGES,
  SHF_MASKOS,
  SHF_MASKPROC,
  decodeFlags
} from "./constants.js";
import type { ElfOptionEntry, ElfReservedRange } from "./constants.js";
import { ELF_MACHINE } from "./machines.js";
import type { ElfEnumValue, ElfMachine, ElfObjectType, SectionFlags, SectionType, SegmentFlags, SegmentType } from "./types.js";

const lookupEnum = (
  code: number,
  options: readonly ElfOptionEntry[],
  ranges: readonly ElfReservedRange[]
): ElfEnumValue | null => {
  const entry = options.find(option => option[0] === code);
  if (entry) return Object.freeze({ code, name: entry[1], description: entry[2] ?? null, range: null });
  const range = ranges.find(candidate => code >= candidate.low && code <= candidate.high);
  if (!range) return null;
  const delta = code - range.low;
  return Object.freeze({
    code,
    name: delta === 0 ? range.name : `${range.name}+0x${delta.toString(16)}`,
    description: range.description,
    range: range.name
  });
};

const allBits = (entries: readonly ElfOptionEntry[]): number =>
  entries.reduce((mask, [bit]) => (mask | bit) >>> 0, 0);

const KNOWN_SEGMENT_FLAG_BITS = (allBits(SEGMENT_FLAGS) | PF_MASKOS | PF_MASKPROC) >>> 0;
const KNOWN_SECTION_FLAG_BITS = BigInt((allBits(SECTION_FLAGS) | SHF_MASKOS | SHF_MASKPROC) >>> 0);

const classifyOrFail = (
  code: number,
  options: readonly ElfOptionEntry[],
  ranges: readonly ElfReservedRange[],
  failure: DecodeFailure
): ElfEnumValue => lookupEnum(code, options, ranges) ?? fail(failure);

export const classifySegmentType = (code: number): SegmentType =>
  classifyOrFail(code, SEGMENT_TYPES, SEGMENT_TYPE_RANGES, { kind: "SegmentType", raw: code });

export const classifySectionType = (code: number): SectionType =>
  classifyOrFail(code, SECTION_TYPES, SECTION_TYPE_RANGES, { kind: "SectionType", raw: code });

export const lookupElfType = (code: number): ElfObjectType =>
  classifyOrFail(code, ELF_TYPE, ELF_TYPE_RANGES, { kind: "UnknownElfType", raw: code });

export const lookupMachine = (code: number): ElfMachine =>
  classifyOrFail(code, ELF_MACHINE, [], { kind: "UnknownMachine", raw: code });

export function classifySegmentFlags(mask: number): SegmentFlags {
  const unknown = (mask & ~KNOWN_SEGMENT_FLAG_BITS) >>> 0;
  if (unknown !== 0) fail({ kind: "SegmentFlag", raw: mask });
  return Object.freeze({ mask, names: Object.freeze(decodeFlags(mask, SEGMENT_FLAGS)) });
}

export function classifySectionFlags(mask: bigint): SectionFlags {
  if ((mask & ~KNOWN_SECTION_FLAG_BITS) !== 0n) fail({ kind: "SectionFlag", raw: mask });
  return Object.freeze({ mask, names: Object.freeze(decodeFlags(Number(mask), SECTION_FLAGS)) });
}
