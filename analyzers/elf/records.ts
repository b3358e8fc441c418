"use strict";

import { ByteCursor } from "./byte-reader.js";
import { ELF_IDENT_SIZE } from "./layout.js";
import type { ElfEncoding } from "./layout.js";
import type { ElfFileHeaderRecord, ElfProgramHeaderRecord, ElfSectionHeaderRecord } from "./types.js";

export function decodeFileHeader(view: DataView, encoding: ElfEncoding): ElfFileHeaderRecord {
  const r = new ByteCursor(view, 0, encoding).require(encoding.layout.fileHeaderSize);
  return {
    ident: r.bytes(ELF_IDENT_SIZE),
    type: r.u16(),
    machine: r.u16(),
    version: r.u32(),
    entry: r.word(),
    phoff: r.word(),
    shoff: r.word(),
    flags: r.u32(),
    ehsize: r.u16(),
    phentsize: r.u16(),
    phnum: r.u16(),
    shentsize: r.u16(),
    shnum: r.u16(),
    shstrndx: r.u16()
  };
}

export function decodeProgramHeader(view: DataView, offset: number, encoding: ElfEncoding): ElfProgramHeaderRecord {
  const r = new ByteCursor(view, offset, encoding).require(encoding.layout.programHeaderSize);
  const type = r.u32();
  const earlyFlags = encoding.layout.programFlagsFirst ? r.u32() : null;
  const fileOffset = r.word();
  const vaddr = r.word();
  const paddr = r.word();
  const filesz = r.word();
  const memsz = r.word();
  const flags = earlyFlags ?? r.u32();
  const align = r.word();
  return { type, flags, offset: fileOffset, vaddr, paddr, filesz, memsz, align };
}

export function decodeSectionHeader(view: DataView, offset: number, encoding: ElfEncoding): ElfSectionHeaderRecord {
  const r = new ByteCursor(view, offset, encoding).require(encoding.layout.sectionHeaderSize);
  return {
    nameOffset: r.u32(),
    type: r.u32(),
    flags: r.word(),
    addr: r.word(),
    offset: r.word(),
    size: r.word(),
    link: r.u32(),
    info: r.u32(),
    addralign: r.word(),
    entsize: r.word()
  };
}
