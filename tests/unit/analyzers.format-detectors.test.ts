"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { ELF_MAGIC_BYTES } from "../../analyzers/elf/ident.js";
import { detectContainerFormat, isTruncatedSignature } from "../../analyzers/format-detectors.js";
import { buildElf64Sample } from "../fixtures/elf-sample-file.js";

const bytesOf = (...values: number[]): Uint8Array => new Uint8Array(values);

void test("detectContainerFormat recognizes executable containers", () => {
  assert.deepEqual(detectContainerFormat(buildElf64Sample().bytes), { format: "elf", label: "ELF" });
  assert.deepEqual(detectContainerFormat(bytesOf(0x4d, 0x5a, 0x90, 0x00)), { format: "mz", label: "MS-DOS/PE (MZ)" });
  assert.deepEqual(detectContainerFormat(bytesOf(0x50, 0x45, 0x00, 0x00, 0x4c, 0x01)), { format: "pe", label: "PE" });
  assert.deepEqual(detectContainerFormat(bytesOf(0xfe, 0xed, 0xfa, 0xce)), { format: "mach-o", label: "Mach-O 32-bit" });
  assert.deepEqual(detectContainerFormat(bytesOf(0xcf, 0xfa, 0xed, 0xfe, 0x07)), {
    format: "mach-o",
    label: "Mach-O 64-bit"
  });
  assert.deepEqual(detectContainerFormat(bytesOf(0xca, 0xfe, 0xba, 0xbe)), {
    format: "mach-o-fat",
    label: "Mach-O universal (Fat)"
  });
});

void test("detectContainerFormat returns null for other data", () => {
  assert.equal(detectContainerFormat(new TextEncoder().encode("abcd")), null);
  assert.equal(detectContainerFormat(bytesOf(0x7f, 0x45, 0x4c)), null);
  assert.equal(detectContainerFormat(new Uint8Array(0)), null);
});

void test("isTruncatedSignature matches cut-off prefixes only", () => {
  assert.equal(isTruncatedSignature(bytesOf(0x7f, 0x45), ELF_MAGIC_BYTES), true);
  assert.equal(isTruncatedSignature(bytesOf(0x7f, 0x46), ELF_MAGIC_BYTES), false);
  assert.equal(isTruncatedSignature(bytesOf(0x7f, 0x45, 0x4c, 0x46), ELF_MAGIC_BYTES), false);
});
