"use strict";

export { decodeExecutable } from "./decode-executable.js";
export { detectContainerFormat } from "./format-detectors.js";
export type { ContainerFormat, ContainerMatch } from "./format-detectors.js";
export { ExecutableDecodeError, describeFailure, isDecodeFailure } from "./errors.js";
export type { DecodeFailure, DecodeFailureKind } from "./errors.js";
export { decodeElf, detectElfClass, decodeIdent, isElfSignature, ElfImage, asElfFormat } from "./elf/index.js";
export type { Elf32, Elf64, ElfFormat, ElfHeaderView, Executable } from "./elf/index.js";
export { ELF32_LAYOUT, ELF64_LAYOUT } from "./elf/layout.js";
export type { ElfClassName, ElfEncoding, ElfWordLayout } from "./elf/layout.js";
export {
  classifySectionFlags,
  classifySectionType,
  classifySegmentFlags,
  classifySegmentType,
  lookupElfType,
  lookupMachine
} from "./elf/classify.js";
export { decodeFileHeader, decodeProgramHeader, decodeSectionHeader } from "./elf/records.js";
export { readInterpreterPath } from "./elf/interpreter.js";
export { vaddrToFileOffset } from "./elf/vaddr-to-file-offset.js";
export { describeExecutable } from "./elf/label.js";
export { DEFAULT_DECODE_OPTIONS } from "./elf/types.js";
export type {
  ElfDecodeOptions,
  ElfEnumValue,
  ElfFileHeaderRecord,
  ElfIdent,
  ElfMachine,
  ElfObjectType,
  ElfProgramHeaderRecord,
  ElfSection,
  ElfSectionHeaderRecord,
  ElfSegment,
  SectionFlags,
  SectionType,
  SegmentFlags,
  SegmentType
} from "./elf/types.js";
