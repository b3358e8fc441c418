"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  classifySectionFlags,
  classifySectionType,
  classifySegmentFlags,
  classifySegmentType,
  lookupElfType,
  lookupMachine
} from "../../analyzers/elf/classify.js";
import { assertDecodeFailure } from "../helpers/decode-assertions.js";

void test("classifySegmentType resolves named codes", () => {
  assert.deepEqual(classifySegmentType(6), {
    code: 6,
    name: "PT_PHDR",
    description: "Program header table itself.",
    range: null
  });
  assert.equal(classifySegmentType(0x6474e553).name, "PT_GNU_PROPERTY");
  assert.equal(classifySegmentType(8).name, "PT_NUM");
});

void test("classifySegmentType accepts reserved ranges with synthesised names", () => {
  const proc = classifySegmentType(0x70000001);
  assert.equal(proc.name, "PT_LOPROC+0x1");
  assert.equal(proc.range, "PT_LOPROC");
  assert.equal(classifySegmentType(0x60000000).name, "PT_LOOS");
});

void test("classifySegmentType fails outside the known space", () => {
  assertDecodeFailure(() => classifySegmentType(0x100), { kind: "SegmentType", raw: 0x100 });
  assertDecodeFailure(() => classifySegmentType(0x80000000), { kind: "SegmentType", raw: 0x80000000 });
});

void test("classifySegmentFlags lists permission bits in PF_X, PF_W, PF_R order", () => {
  assert.deepEqual(classifySegmentFlags(5), { mask: 5, names: ["PF_X", "PF_R"] });
  assert.deepEqual(classifySegmentFlags(0x80000004), { mask: 0x80000004, names: ["PF_R"] });
  assertDecodeFailure(() => classifySegmentFlags(0x8), { kind: "SegmentFlag", raw: 0x8 });
});

void test("classifySectionType covers gABI, GNU and reserved codes", () => {
  assert.equal(classifySectionType(1).name, "SHT_PROGBITS");
  assert.equal(classifySectionType(19).name, "SHT_RELR");
  assert.equal(classifySectionType(0x6ffffff6).name, "SHT_GNU_HASH");
  assert.equal(classifySectionType(0x80000005).name, "SHT_LOUSER+0x5");
  assertDecodeFailure(() => classifySectionType(12), { kind: "SectionType", raw: 12 });
});

void test("classifySectionFlags validates the 64-bit mask", () => {
  assert.deepEqual(classifySectionFlags(2n), { mask: 2n, names: ["SHF_ALLOC"] });
  assert.deepEqual(classifySectionFlags(0x80000006n), { mask: 0x80000006n, names: ["SHF_ALLOC", "SHF_EXECINSTR"] });
  assertDecodeFailure(() => classifySectionFlags(0x1000n), { kind: "SectionFlag", raw: 0x1000n });
  assertDecodeFailure(() => classifySectionFlags(0x100000000n), { kind: "SectionFlag", raw: 0x100000000n });
});

void test("lookupElfType and lookupMachine fail with typed errors", () => {
  assert.equal(lookupElfType(3).name, "ET_DYN");
  assert.equal(lookupElfType(0xfe01).name, "ET_LOOS+0x1");
  assertDecodeFailure(() => lookupElfType(5), { kind: "UnknownElfType", raw: 5 });
  assert.deepEqual(lookupMachine(62), { code: 62, name: "EM_X86_64", description: "x86-64", range: null });
  assert.equal(lookupMachine(183).name, "EM_AARCH64");
  assert.equal(lookupMachine(257).name, "EM_65816");
  assert.equal(lookupMachine(258).name, "EM_LOONGARCH");
  assertDecodeFailure(() => lookupMachine(0xbeef), { kind: "UnknownMachine", raw: 0xbeef });
});

void test("classification results cannot be modified", () => {
  const flags = classifySegmentFlags(5);
  assert.equal(Object.isFrozen(flags), true);
  assert.equal(Object.isFrozen(flags.names), true);
  assert.equal(Object.isFrozen(classifySectionFlags(6n).names), true);
  const segmentType = classifySegmentType(1);
  assert.equal(Reflect.set(segmentType, "name", "PT_NOTE"), false);
  assert.equal(classifySegmentType(1).name, "PT_LOAD");
  assert.equal(Object.isFrozen(classifySegmentType(0x70000001)), true);
});
