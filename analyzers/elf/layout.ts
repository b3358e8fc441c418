"use strict";

export type ElfClassName = "ELF32" | "ELF64";

/**
 * Field widths and fixed record sizes for one ELF class. The header decoders are written
 * once against this description and instantiated for both classes.
 */
export interface ElfWordLayout<C extends ElfClassName = ElfClassName> {
  readonly elfClass: C;
  readonly classByte: 1 | 2;
  /** Width of Elf_Addr / Elf_Off / Elf_Xword style fields. */
  readonly wordSize: 4 | 8;
  readonly fileHeaderSize: number;
  readonly programHeaderSize: number;
  readonly sectionHeaderSize: number;
  /** ELF64 moves p_flags up next to p_type; ELF32 keeps it after p_memsz. */
  readonly programFlagsFirst: boolean;
}

export const ELF32_LAYOUT: ElfWordLayout<"ELF32"> = {
  elfClass: "ELF32",
  classByte: 1,
  wordSize: 4,
  fileHeaderSize: 0x34,
  programHeaderSize: 0x20,
  sectionHeaderSize: 0x28,
  programFlagsFirst: false
};

export const ELF64_LAYOUT: ElfWordLayout<"ELF64"> = {
  elfClass: "ELF64",
  classByte: 2,
  wordSize: 8,
  fileHeaderSize: 0x40,
  programHeaderSize: 0x38,
  sectionHeaderSize: 0x40,
  programFlagsFirst: true
};

export const ELF_IDENT_SIZE = 16;

export interface ElfEncoding<C extends ElfClassName = ElfClassName> {
  layout: ElfWordLayout<C>;
  littleEndian: boolean;
}
