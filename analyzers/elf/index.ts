"use strict";

import { toByteArray, viewOf } from "../../binary-utils.js";
import { lookupElfType, lookupMachine } from "./classify.js";
import {
  decodeSections,
  decodeSegments,
  resolveExtendedHeaderCounts,
  resolveSectionNames
} from "./header-tables.js";
import type { ElfDecodeContext } from "./header-tables.js";
import { requireBytes } from "./byte-reader.js";
import { decodeIdent, detectElfClass } from "./ident.js";
import { ElfImage } from "./image.js";
import type { Executable } from "./image.js";
import { decodeFileHeader } from "./records.js";
import { DEFAULT_DECODE_OPTIONS } from "./types.js";
import type { ElfDecodeOptions } from "./types.js";

/**
 * Decodes a complete ELF image held in memory. Segment and section `data` are views over
 * `input`; the caller keeps the buffer alive for as long as the image is used.
 *
 * Throws `ExecutableDecodeError` on any structural problem; there is no partial result.
 */
export function decodeElf(input: ArrayBuffer | ArrayBufferView, options: ElfDecodeOptions = {}): Executable {
  const bytes = toByteArray(input);
  const view = viewOf(bytes);
  // Report the shortfall against the whole file header, not just the ident block.
  requireBytes(view, 0, detectElfClass(bytes).fileHeaderSize);
  const issues: string[] = [];
  const { ident, encoding } = decodeIdent(bytes, issues);
  const ctx: ElfDecodeContext = {
    bytes,
    view,
    encoding,
    options: { ...DEFAULT_DECODE_OPTIONS, ...options },
    issues
  };
  const rawHeader = decodeFileHeader(ctx.view, encoding);
  lookupElfType(rawHeader.type);
  lookupMachine(rawHeader.machine);
  if (rawHeader.version !== 1) issues.push(`Unexpected ELF header version ${rawHeader.version}.`);
  const header = ctx.options.resolveExtendedNumbering ? resolveExtendedHeaderCounts(ctx, rawHeader) : rawHeader;
  const segments = decodeSegments(ctx, header);
  const sections = resolveSectionNames(ctx, decodeSections(ctx, header), header.shstrndx);
  const parts = {
    littleEndian: encoding.littleEndian,
    ident,
    rawHeader,
    header,
    segments,
    sections,
    issues,
    fileSize: bytes.length
  };
  return encoding.layout.elfClass === "ELF32"
    ? new ElfImage<"ELF32">({ ...parts, elfClass: "ELF32" })
    : new ElfImage<"ELF64">({ ...parts, elfClass: "ELF64" });
}

export { detectElfClass, decodeIdent, isElfSignature, ELF_MAGIC_BYTES } from "./ident.js";
export { ElfImage, asElfFormat } from "./image.js";
export type { Elf32, Elf64, ElfFormat, ElfHeaderView, Executable } from "./image.js";
