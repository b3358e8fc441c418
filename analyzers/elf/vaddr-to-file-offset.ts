"use strict";

import { PT_LOAD } from "./constants.js";
import type { ElfProgramHeaderRecord, ElfSegment } from "./types.js";

// Only the file-backed part [vaddr, vaddr + filesz) has an offset; the memsz tail does not.
const coversAddress = (record: Readonly<ElfProgramHeaderRecord>, vaddr: bigint): boolean =>
  vaddr >= record.vaddr && vaddr - record.vaddr < record.filesz;

export function vaddrToFileOffset(segments: readonly ElfSegment[], vaddr: bigint): bigint | null {
  const load = segments.find(segment => segment.record.type === PT_LOAD && coversAddress(segment.record, vaddr));
  return load ? load.record.offset + (vaddr - load.record.vaddr) : null;
}
