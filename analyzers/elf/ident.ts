"use strict";

import { startsWithBytes } from "../../binary-utils.js";
import { fail } from "../errors.js";
import { ELF_DATA, ELF_CLASS, decodeOption } from "./constants.js";
import { ELF32_LAYOUT, ELF64_LAYOUT, ELF_IDENT_SIZE } from "./layout.js";
import type { ElfEncoding, ElfWordLayout } from "./layout.js";
import type { ElfIdent } from "./types.js";

export const ELF_MAGIC_BYTES: readonly number[] = [0x7f, 0x45, 0x4c, 0x46];

const EI_CLASS = 4;
const EI_DATA = 5;
const EI_VERSION = 6;
const EI_OSABI = 7;
const EI_ABIVERSION = 8;
const ELFDATA2LSB = 1;
const ELFDATA2MSB = 2;

const hasMagicPrefix = (bytes: Uint8Array): boolean =>
  ELF_MAGIC_BYTES.slice(0, Math.min(bytes.length, ELF_MAGIC_BYTES.length)).every(
    (value, index) => bytes[index] === value
  );

export function detectElfClass(bytes: Uint8Array): ElfWordLayout {
  if (!hasMagicPrefix(bytes)) fail({ kind: "MalformedInput", reason: "missing ELF magic signature" });
  if (bytes.length <= EI_CLASS) fail({ kind: "Incomplete", needed: EI_CLASS + 1 - bytes.length });
  const classByte = bytes[EI_CLASS] ?? 0;
  if (classByte === ELF32_LAYOUT.classByte) return ELF32_LAYOUT;
  if (classByte === ELF64_LAYOUT.classByte) return ELF64_LAYOUT;
  return fail({ kind: "UnsupportedClass", classByte });
}

export const isElfSignature = (bytes: Uint8Array): boolean => startsWithBytes(bytes, ELF_MAGIC_BYTES);

export function decodeIdent(bytes: Uint8Array, issues: string[]): { ident: ElfIdent; encoding: ElfEncoding } {
  const layout = detectElfClass(bytes);
  if (bytes.length < ELF_IDENT_SIZE) fail({ kind: "Incomplete", needed: ELF_IDENT_SIZE - bytes.length });
  const dataByte = bytes[EI_DATA] ?? 0;
  const version = bytes[EI_VERSION] ?? 0;
  if (dataByte !== ELFDATA2LSB && dataByte !== ELFDATA2MSB) {
    issues.push(`Unknown data encoding ${dataByte}; decoding as little endian.`);
  }
  if (version !== 1) issues.push(`Unexpected ELF ident version ${version}.`);
  const ident: ElfIdent = {
    classByte: layout.classByte,
    className: decodeOption(layout.classByte, ELF_CLASS) ?? layout.elfClass,
    dataByte,
    dataName: decodeOption(dataByte, ELF_DATA) ?? "Unknown",
    version,
    osabi: bytes[EI_OSABI] ?? 0,
    abiVersion: bytes[EI_ABIVERSION] ?? 0
  };
  return { ident, encoding: { layout, littleEndian: dataByte !== ELFDATA2MSB } };
}
