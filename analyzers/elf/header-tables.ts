"use strict";

import { findNulTerminator, toSafeIndex } from "../../binary-utils.js";
import { fail } from "../errors.js";
import { requireBytes } from "./byte-reader.js";
import { classifySectionFlags, classifySectionType, classifySegmentFlags, classifySegmentType } from "./classify.js";
import { PN_XNUM, SHN_UNDEF, SHN_XINDEX, SHT_NOBITS } from "./constants.js";
import type { ElfEncoding } from "./layout.js";
import { decodeProgramHeader, decodeSectionHeader } from "./records.js";
import type { ElfDecodeOptions, ElfFileHeaderRecord, ElfSection, ElfSegment } from "./types.js";

export interface ElfDecodeContext {
  bytes: Uint8Array;
  view: DataView;
  encoding: ElfEncoding;
  options: Required<ElfDecodeOptions>;
  issues: string[];
}

interface TablePlacement {
  start: number;
  stride: number;
}

const NAME_DECODER = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function sliceInput(bytes: Uint8Array, offset: bigint, size: bigint, what: string): Uint8Array {
  const end = offset + size;
  if (end > BigInt(bytes.length)) {
    fail({ kind: "OutOfBounds", what, offset, size, length: bytes.length });
  }
  return bytes.subarray(Number(offset), Number(end));
}

function placeTable(
  ctx: ElfDecodeContext,
  label: string,
  offset: bigint,
  count: number,
  declaredEntrySize: number,
  recordSize: number
): TablePlacement | null {
  if (count === 0) return null;
  const className = ctx.encoding.layout.elfClass;
  if (declaredEntrySize < recordSize) {
    fail({
      kind: "MalformedInput",
      reason: `${label} entry size (${declaredEntrySize}) is smaller than ${className} minimum (${recordSize})`
    });
  }
  if (declaredEntrySize > recordSize) {
    if (ctx.options.strictEntrySize) {
      fail({
        kind: "MalformedInput",
        reason: `${label} entry size (${declaredEntrySize}) does not match ${className} record size (${recordSize})`
      });
    }
    ctx.issues.push(
      `${label} entry size (${declaredEntrySize}) exceeds ${className} record size (${recordSize}); ` +
        `skipping ${declaredEntrySize - recordSize} padding bytes per entry.`
    );
  }
  const start = toSafeIndex(offset);
  if (start == null) return fail({ kind: "IncompleteUnknown" });
  // The whole table has to be present before any entry is decoded.
  requireBytes(ctx.view, start, (count - 1) * declaredEntrySize + recordSize);
  return { start, stride: declaredEntrySize };
}

export function resolveExtendedHeaderCounts(ctx: ElfDecodeContext, header: ElfFileHeaderRecord): ElfFileHeaderRecord {
  const needsPhnum = header.phnum === PN_XNUM;
  const needsShnum = header.shnum === 0 && header.shoff !== 0n;
  const needsShstrndx = header.shstrndx === SHN_XINDEX;
  if (!needsPhnum && !needsShnum && !needsShstrndx) return header;
  const { layout } = ctx.encoding;
  if (header.shoff === 0n) {
    return fail({
      kind: "MalformedInput",
      reason: "extended numbering requires section header #0, but the section header table is missing"
    });
  }
  if (header.shentsize < layout.sectionHeaderSize) {
    return fail({
      kind: "MalformedInput",
      reason: `section header entry size (${header.shentsize}) is smaller than ${layout.elfClass} minimum (${layout.sectionHeaderSize})`
    });
  }
  const start = toSafeIndex(header.shoff) ?? fail({ kind: "IncompleteUnknown" });
  const sectionZero = decodeSectionHeader(ctx.view, start, ctx.encoding);
  const shnum = needsShnum ? toSafeIndex(sectionZero.size) : header.shnum;
  if (shnum == null) {
    return fail({ kind: "MalformedInput", reason: `section count ${sectionZero.size.toString()} is too large` });
  }
  return {
    ...header,
    phnum: needsPhnum ? sectionZero.info : header.phnum,
    shnum,
    shstrndx: needsShstrndx ? sectionZero.link : header.shstrndx
  };
}

export function decodeSegments(ctx: ElfDecodeContext, header: ElfFileHeaderRecord): ElfSegment[] {
  const { layout } = ctx.encoding;
  const table = placeTable(ctx, "Program header", header.phoff, header.phnum, header.phentsize, layout.programHeaderSize);
  if (!table) return [];
  const segments: ElfSegment[] = [];
  for (let index = 0; index < header.phnum; index += 1) {
    const record = decodeProgramHeader(ctx.view, table.start + index * table.stride, ctx.encoding);
    const segmentType = classifySegmentType(record.type);
    const flags = classifySegmentFlags(record.flags);
    const data = sliceInput(ctx.bytes, record.offset, record.filesz, `Segment ${index}`);
    segments.push(Object.freeze({ index, record: Object.freeze(record), segmentType, flags, data }));
  }
  return segments;
}

export function decodeSections(ctx: ElfDecodeContext, header: ElfFileHeaderRecord): ElfSection[] {
  const { layout } = ctx.encoding;
  const table = placeTable(ctx, "Section header", header.shoff, header.shnum, header.shentsize, layout.sectionHeaderSize);
  if (!table) return [];
  const sections: ElfSection[] = [];
  for (let index = 0; index < header.shnum; index += 1) {
    const record = decodeSectionHeader(ctx.view, table.start + index * table.stride, ctx.encoding);
    const sectionType = classifySectionType(record.type);
    const flags = classifySectionFlags(record.flags);
    // NOBITS sections reserve memory only; their sh_size describes no file bytes.
    const fileSize = record.type === SHT_NOBITS ? 0n : record.size;
    const data = sliceInput(ctx.bytes, record.offset, fileSize, `Section ${index}`);
    sections.push({ index, record: Object.freeze(record), sectionType, flags, name: "", data });
  }
  return sections;
}

export function readSectionName(table: Uint8Array, nameOffset: number, sectionIndex: number): string {
  const end = findNulTerminator(table, nameOffset);
  if (end < 0) {
    return fail({
      kind: "MalformedInput",
      reason: `section ${sectionIndex} name at offset ${nameOffset} is not NUL-terminated inside the string table`
    });
  }
  try {
    return NAME_DECODER.decode(table.subarray(nameOffset, end));
  } catch {
    return fail({ kind: "MalformedInput", reason: `section ${sectionIndex} name is not valid UTF-8` });
  }
}

export function resolveSectionNames(ctx: ElfDecodeContext, sections: ElfSection[], shstrndx: number): ElfSection[] {
  const table = shstrndx === SHN_UNDEF ? undefined : sections[shstrndx];
  if (!table) {
    if (shstrndx !== SHN_UNDEF) {
      ctx.issues.push(`Section name table index ${shstrndx} is outside the ${sections.length}-entry section table.`);
    }
    return sections.map(section => Object.freeze(section));
  }
  return sections.map(section =>
    Object.freeze({ ...section, name: readSectionName(table.data, section.record.nameOffset, section.index) })
  );
}
