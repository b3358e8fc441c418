"use strict";

import { lookupElfType, lookupMachine } from "./classify.js";
import type { ElfClassName } from "./layout.js";
import type {
  ElfFileHeaderRecord,
  ElfIdent,
  ElfMachine,
  ElfObjectType,
  ElfSection,
  ElfSegment
} from "./types.js";

/** Header fields with the same names and types for ELF32 and ELF64. */
export interface ElfHeaderView {
  /** The header exactly as stored in the file, before extended numbering is applied. */
  readonly raw: Readonly<ElfFileHeaderRecord>;
  readonly ident: Readonly<ElfIdent>;
  readonly entryPoint: bigint;
  readonly programHeaderOffset: bigint;
  readonly programHeaderEntrySize: number;
  readonly programHeaderCount: number;
  readonly sectionHeaderOffset: bigint;
  readonly sectionHeaderEntrySize: number;
  readonly sectionHeaderCount: number;
  readonly sectionNameTableIndex: number;
  readonly flags: number;
  readonly version: number;
  elfType(): ElfObjectType;
  machine(): ElfMachine;
}

/** Width-erased view over a decoded image. */
export interface ElfFormat {
  readonly elfClass: ElfClassName;
  readonly littleEndian: boolean;
  readonly issues: readonly string[];
  header(): ElfHeaderView;
  segments(): readonly ElfSegment[];
  sections(): readonly ElfSection[];
  sectionByName(name: string): ElfSection | null;
  segmentsOfType(typeName: string): ElfSegment[];
  sectionsOfType(typeName: string): ElfSection[];
}

class ElfHeaderAccessor implements ElfHeaderView {
  readonly raw: Readonly<ElfFileHeaderRecord>;
  readonly ident: Readonly<ElfIdent>;
  private readonly resolved: Readonly<ElfFileHeaderRecord>;

  constructor(raw: ElfFileHeaderRecord, resolved: ElfFileHeaderRecord, ident: ElfIdent) {
    this.raw = Object.freeze(raw);
    this.resolved = resolved === raw ? this.raw : Object.freeze(resolved);
    this.ident = Object.freeze(ident);
    Object.freeze(this);
  }

  get entryPoint(): bigint {
    return this.resolved.entry;
  }

  get programHeaderOffset(): bigint {
    return this.resolved.phoff;
  }

  get programHeaderEntrySize(): number {
    return this.resolved.phentsize;
  }

  get programHeaderCount(): number {
    return this.resolved.phnum;
  }

  get sectionHeaderOffset(): bigint {
    return this.resolved.shoff;
  }

  get sectionHeaderEntrySize(): number {
    return this.resolved.shentsize;
  }

  get sectionHeaderCount(): number {
    return this.resolved.shnum;
  }

  get sectionNameTableIndex(): number {
    return this.resolved.shstrndx;
  }

  get flags(): number {
    return this.resolved.flags;
  }

  get version(): number {
    return this.resolved.version;
  }

  elfType(): ElfObjectType {
    return lookupElfType(this.resolved.type);
  }

  machine(): ElfMachine {
    return lookupMachine(this.resolved.machine);
  }
}

export interface ElfImageInit<C extends ElfClassName> {
  elfClass: C;
  littleEndian: boolean;
  ident: ElfIdent;
  rawHeader: ElfFileHeaderRecord;
  header: ElfFileHeaderRecord;
  segments: ElfSegment[];
  sections: ElfSection[];
  issues: string[];
  fileSize: number;
}

export class ElfImage<C extends ElfClassName = ElfClassName> implements ElfFormat {
  readonly elfClass: C;
  readonly littleEndian: boolean;
  readonly issues: readonly string[];
  readonly fileSize: number;
  private readonly headerView: ElfHeaderView;
  private readonly segmentList: readonly ElfSegment[];
  private readonly sectionList: readonly ElfSection[];

  constructor(init: ElfImageInit<C>) {
    this.elfClass = init.elfClass;
    this.littleEndian = init.littleEndian;
    this.issues = Object.freeze([...init.issues]);
    this.fileSize = init.fileSize;
    this.headerView = new ElfHeaderAccessor(init.rawHeader, init.header, init.ident);
    this.segmentList = Object.freeze([...init.segments]);
    this.sectionList = Object.freeze([...init.sections]);
    Object.freeze(this);
  }

  get is64(): boolean {
    return this.elfClass === "ELF64";
  }

  header(): ElfHeaderView {
    return this.headerView;
  }

  segments(): readonly ElfSegment[] {
    return this.segmentList;
  }

  sections(): readonly ElfSection[] {
    return this.sectionList;
  }

  sectionByName(name: string): ElfSection | null {
    return this.sectionList.find(section => section.name === name) ?? null;
  }

  segmentsOfType(typeName: string): ElfSegment[] {
    return this.segmentList.filter(segment => segment.segmentType.name === typeName);
  }

  sectionsOfType(typeName: string): ElfSection[] {
    return this.sectionList.filter(section => section.sectionType.name === typeName);
  }
}

export type Elf32 = ElfImage<"ELF32">;
export type Elf64 = ElfImage<"ELF64">;

/** A decoded executable, tagged by `elfClass`. */
export type Executable = Elf32 | Elf64;

export const asElfFormat = (executable: Executable): ElfFormat => executable;
