"use strict";

export interface ElfIdent {
  classByte: number;
  className: string;
  dataByte: number;
  dataName: string;
  version: number;
  osabi: number;
  abiVersion: number;
}

export interface ElfFileHeaderRecord {
  ident: Uint8Array;
  type: number;
  machine: number;
  version: number;
  entry: bigint;
  phoff: bigint;
  shoff: bigint;
  flags: number;
  ehsize: number;
  phentsize: number;
  phnum: number;
  shentsize: number;
  shnum: number;
  shstrndx: number;
}

export interface ElfProgramHeaderRecord {
  type: number;
  flags: number;
  offset: bigint;
  vaddr: bigint;
  paddr: bigint;
  filesz: bigint;
  memsz: bigint;
  align: bigint;
}

export interface ElfSectionHeaderRecord {
  nameOffset: number;
  type: number;
  flags: bigint;
  addr: bigint;
  offset: bigint;
  size: bigint;
  link: number;
  info: number;
  addralign: bigint;
  entsize: bigint;
}

/** A classified enumeration value; `range` is set when the code only falls inside a reserved range. */
export interface ElfEnumValue {
  readonly code: number;
  readonly name: string;
  readonly description: string | null;
  readonly range: string | null;
}

export type ElfObjectType = ElfEnumValue;
export type ElfMachine = ElfEnumValue;
export type SegmentType = ElfEnumValue;
export type SectionType = ElfEnumValue;

export interface SegmentFlags {
  readonly mask: number;
  readonly names: readonly string[];
}

export interface SectionFlags {
  readonly mask: bigint;
  readonly names: readonly string[];
}

export interface ElfSegment {
  readonly index: number;
  readonly record: Readonly<ElfProgramHeaderRecord>;
  readonly segmentType: Readonly<SegmentType>;
  readonly flags: Readonly<SegmentFlags>;
  /** File-resident bytes, a view over the decoded buffer. */
  readonly data: Uint8Array;
}

export interface ElfSection {
  readonly index: number;
  readonly record: Readonly<ElfSectionHeaderRecord>;
  readonly sectionType: Readonly<SectionType>;
  readonly flags: Readonly<SectionFlags>;
  readonly name: string;
  readonly data: Uint8Array;
}

export interface ElfDecodeOptions {
  /** Reject table entries wider than the fixed record size instead of skipping the padding. */
  strictEntrySize?: boolean;
  /** Resolve PN_XNUM / SHN_XINDEX counts from section header #0. */
  resolveExtendedNumbering?: boolean;
}

export const DEFAULT_DECODE_OPTIONS: Required<ElfDecodeOptions> = {
  strictEntrySize: false,
  resolveExtendedNumbering: true
};
