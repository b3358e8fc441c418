"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { decodeIdent, detectElfClass } from "../../analyzers/elf/ident.js";
import { ELF32_LAYOUT, ELF64_LAYOUT } from "../../analyzers/elf/layout.js";
import { buildElf32Sample, buildElf64Sample } from "../fixtures/elf-sample-file.js";
import { assertDecodeFailure } from "../helpers/decode-assertions.js";

const identBytes = (classByte: number, dataByte: number, version: number): Uint8Array =>
  new Uint8Array([0x7f, 0x45, 0x4c, 0x46, classByte, dataByte, version, 3, 0, 0, 0, 0, 0, 0, 0, 0]);

void test("detectElfClass picks the layout from the class byte", () => {
  assert.equal(detectElfClass(buildElf32Sample().bytes), ELF32_LAYOUT);
  assert.equal(detectElfClass(buildElf64Sample().bytes), ELF64_LAYOUT);
});

void test("detectElfClass rejects unknown class bytes with the raw value", () => {
  assertDecodeFailure(() => detectElfClass(new Uint8Array([0x7f, 0x45, 0x4c, 0x46, 0x05])), {
    kind: "UnsupportedClass",
    classByte: 5
  });
  assertDecodeFailure(() => detectElfClass(identBytes(0, 1, 1)), { kind: "UnsupportedClass", classByte: 0 });
});

void test("detectElfClass requires the magic signature", () => {
  const malformed = { kind: "MalformedInput", reason: "missing ELF magic signature" } as const;
  assertDecodeFailure(() => detectElfClass(new Uint8Array([0x4d, 0x5a, 0x90, 0x00, 0x03])), malformed);
  assertDecodeFailure(() => detectElfClass(new Uint8Array([0x7f, 0x00])), malformed);
});

void test("detectElfClass reports how many bytes are missing", () => {
  assertDecodeFailure(() => detectElfClass(new Uint8Array([0x7f, 0x45, 0x4c, 0x46])), { kind: "Incomplete", needed: 1 });
  assertDecodeFailure(() => detectElfClass(new Uint8Array([0x7f, 0x45])), { kind: "Incomplete", needed: 3 });
});

void test("decodeIdent reads the identification block", () => {
  const issues: string[] = [];
  const { ident, encoding } = decodeIdent(identBytes(2, 1, 1), issues);
  assert.deepEqual(ident, {
    classByte: 2,
    className: "ELF64",
    dataByte: 1,
    dataName: "Little endian",
    version: 1,
    osabi: 3,
    abiVersion: 0
  });
  assert.equal(encoding.layout, ELF64_LAYOUT);
  assert.equal(encoding.littleEndian, true);
  assert.deepEqual(issues, []);
});

void test("decodeIdent switches to big endian for ELFDATA2MSB", () => {
  const { ident, encoding } = decodeIdent(identBytes(1, 2, 1), []);
  assert.equal(ident.dataName, "Big endian");
  assert.equal(encoding.layout, ELF32_LAYOUT);
  assert.equal(encoding.littleEndian, false);
});

void test("decodeIdent records unexpected data and version bytes as issues", () => {
  const issues: string[] = [];
  const { encoding } = decodeIdent(identBytes(1, 3, 2), issues);
  assert.equal(encoding.littleEndian, true);
  assert.deepEqual(issues, ["Unknown data encoding 3; decoding as little endian.", "Unexpected ELF ident version 2."]);
});

void test("decodeIdent needs the full 16-byte block", () => {
  assertDecodeFailure(() => decodeIdent(new Uint8Array([0x7f, 0x45, 0x4c, 0x46, 0x01]), []), {
    kind: "Incomplete",
    needed: 11
  });
});
