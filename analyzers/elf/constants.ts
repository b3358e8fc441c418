"use strict";

export type ElfOptionEntry = readonly [number, string, string?];

export interface ElfReservedRange {
  low: number;
  high: number;
  name: string;
  description: string;
}

export const decodeOption = (value: number, options: readonly ElfOptionEntry[]): string | null =>
  options.find(entry => entry[0] === value)?.[1] ?? null;

export const describeOption = (value: number, options: readonly ElfOptionEntry[]): string | null =>
  options.find(entry => entry[0] === value)?.[2] ?? null;

export const decodeFlags = (mask: number, flags: readonly ElfOptionEntry[]): string[] =>
  flags.filter(([bit]) => (mask & bit) !== 0).map(([, name]) => name);

export const ELF_CLASS: readonly ElfOptionEntry[] = [
  [1, "ELF32", "32-bit objects with 4-byte addresses."],
  [2, "ELF64", "64-bit objects with 8-byte addresses."]
];

export const ELF_DATA: readonly ElfOptionEntry[] = [
  [1, "Little endian", "Least-significant byte first (LSB)."],
  [2, "Big endian", "Most-significant byte first (MSB)."]
];

export const ELF_TYPE: readonly ElfOptionEntry[] = [
  [0, "ET_NONE", "Unspecified."],
  [1, "ET_REL", "Object file used for linking."],
  [2, "ET_EXEC", "Loadable image with an entry point."],
  [3, "ET_DYN", "Position-independent executable or shared library."],
  [4, "ET_CORE", "Process image captured after a crash."]
];

export const ELF_TYPE_RANGES: readonly ElfReservedRange[] = [
  { low: 0xfe00, high: 0xfeff, name: "ET_LOOS", description: "Operating system specific." },
  { low: 0xff00, high: 0xffff, name: "ET_LOPROC", description: "Processor specific." }
];

export const SEGMENT_TYPES: readonly ElfOptionEntry[] = [
  [0, "PT_NULL", "Unused program header entry."],
  [1, "PT_LOAD", "Loadable segment."],
  [2, "PT_DYNAMIC", "Dynamic linking information."],
  [3, "PT_INTERP", "Program interpreter path."],
  [4, "PT_NOTE", "Auxiliary information notes."],
  [5, "PT_SHLIB", "Reserved (should not appear)."],
  [6, "PT_PHDR", "Program header table itself."],
  [7, "PT_TLS", "Thread-local storage template."],
  [8, "PT_NUM", "Number of defined types."],
  [0x6474e550, "PT_GNU_EH_FRAME", "Exception handling frames (GNU)."],
  [0x6474e551, "PT_GNU_STACK", "Stack flags (GNU)."],
  [0x6474e552, "PT_GNU_RELRO", "Read-only after relocation (GNU)."],
  [0x6474e553, "PT_GNU_PROPERTY", "Program property notes (GNU)."],
  [0x6474e554, "PT_GNU_SFRAME", "Stack trace information (GNU)."],
  [0x6ffffffa, "PT_SUNWBSS", "Sun-specific BSS."],
  [0x6ffffffb, "PT_SUNWSTACK", "Sun-specific stack."]
];

export const SEGMENT_TYPE_RANGES: readonly ElfReservedRange[] = [
  { low: 0x60000000, high: 0x6fffffff, name: "PT_LOOS", description: "Operating system specific." },
  { low: 0x70000000, high: 0x7fffffff, name: "PT_LOPROC", description: "Processor specific." }
];

export const SEGMENT_FLAGS: readonly ElfOptionEntry[] = [
  [0x1, "PF_X", "Execute permission."],
  [0x2, "PF_W", "Writable."],
  [0x4, "PF_R", "Readable."]
];

export const PF_MASKOS = 0x0ff00000;
export const PF_MASKPROC = 0xf0000000;

export const SECTION_TYPES: readonly ElfOptionEntry[] = [
  [0, "SHT_NULL", "Unused."],
  [1, "SHT_PROGBITS", "Program-defined contents."],
  [2, "SHT_SYMTAB", "Linker symbol table."],
  [3, "SHT_STRTAB", "String table."],
  [4, "SHT_RELA", "Relocation entries with addends."],
  [5, "SHT_HASH", "Symbol hash table."],
  [6, "SHT_DYNAMIC", "Dynamic linking information."],
  [7, "SHT_NOTE", "Auxiliary information notes."],
  [8, "SHT_NOBITS", "Zero-initialized data (BSS)."],
  [9, "SHT_REL", "Relocation entries without addends."],
  [10, "SHT_SHLIB", "Reserved (should not appear)."],
  [11, "SHT_DYNSYM", "Dynamic symbol table."],
  [14, "SHT_INIT_ARRAY", "Array of constructors."],
  [15, "SHT_FINI_ARRAY", "Array of destructors."],
  [16, "SHT_PREINIT_ARRAY", "Array of pre-constructors."],
  [17, "SHT_GROUP", "Section group."],
  [18, "SHT_SYMTAB_SHNDX", "Extended section indices."],
  [19, "SHT_RELR", "Relative relocation bitmaps."],
  [0x6ffffff5, "SHT_GNU_ATTRIBUTES", "Object attributes (GNU)."],
  [0x6ffffff6, "SHT_GNU_HASH", "GNU-style hash table."],
  [0x6ffffff7, "SHT_GNU_LIBLIST", "Prelink library list."],
  [0x6ffffff8, "SHT_CHECKSUM", "Checksum for DSO content."],
  [0x6ffffffa, "SHT_SUNW_move", "Sun-specific move table."],
  [0x6ffffffb, "SHT_SUNW_COMDAT", "Sun-specific COMDAT."],
  [0x6ffffffc, "SHT_SUNW_syminfo", "Sun-specific symbol information."],
  [0x6ffffffd, "SHT_GNU_verdef", "Version definitions."],
  [0x6ffffffe, "SHT_GNU_verneed", "Version requirements."],
  [0x6fffffff, "SHT_GNU_versym", "Version symbol table."]
];

export const SECTION_TYPE_RANGES: readonly ElfReservedRange[] = [
  { low: 0x60000000, high: 0x6fffffff, name: "SHT_LOOS", description: "Operating system specific." },
  { low: 0x70000000, high: 0x7fffffff, name: "SHT_LOPROC", description: "Processor specific." },
  { low: 0x80000000, high: 0x8fffffff, name: "SHT_LOUSER", description: "Application specific." }
];

export const SECTION_FLAGS: readonly ElfOptionEntry[] = [
  [0x1, "SHF_WRITE", "Section is writable at runtime."],
  [0x2, "SHF_ALLOC", "Occupies memory when loaded."],
  [0x4, "SHF_EXECINSTR", "Contains executable code."],
  [0x10, "SHF_MERGE", "May be merged to eliminate duplicates."],
  [0x20, "SHF_STRINGS", "Contains NUL-terminated strings."],
  [0x40, "SHF_INFO_LINK", "sh_info field has extra meaning."],
  [0x80, "SHF_LINK_ORDER", "Special ordering requirements."],
  [0x100, "SHF_OS_NONCONFORMING", "Requires OS-specific processing."],
  [0x200, "SHF_GROUP", "Section is part of a group."],
  [0x400, "SHF_TLS", "Thread-local storage."],
  [0x800, "SHF_COMPRESSED", "Contents are compressed."]
];

export const SHF_MASKOS = 0x0ff00000;
export const SHF_MASKPROC = 0xf0000000;

export const PT_LOAD = 1;
export const PT_INTERP = 3;
export const SHT_NOBITS = 8;

// Extended numbering sentinels.
export const PN_XNUM = 0xffff;
export const SHN_UNDEF = 0;
export const SHN_XINDEX = 0xffff;
