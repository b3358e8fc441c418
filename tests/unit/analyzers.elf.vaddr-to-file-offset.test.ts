"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { decodeElf } from "../../analyzers/elf/index.js";
import { vaddrToFileOffset } from "../../analyzers/elf/vaddr-to-file-offset.js";
import { buildElf64Sample } from "../fixtures/elf-sample-file.js";

void test("vaddrToFileOffset maps addresses inside file-backed PT_LOAD ranges", () => {
  const segments = decodeElf(buildElf64Sample().bytes).segments();
  assert.equal(vaddrToFileOffset(segments, 0x10n), 0x10n);
  assert.equal(vaddrToFileOffset(segments, 0x1254n), 0x254n);
  assert.equal(vaddrToFileOffset(segments, 0x1257n), 0x257n);
});

void test("vaddrToFileOffset returns null outside file-backed ranges", () => {
  const segments = decodeElf(buildElf64Sample().bytes).segments();
  assert.equal(vaddrToFileOffset(segments, 0x1258n), null);
  assert.equal(vaddrToFileOffset(segments, 0x254n), null);
  // .bss occupies memory only.
  assert.equal(vaddrToFileOffset(segments, 0x4000n), null);
  assert.equal(vaddrToFileOffset([], 0x1254n), null);
});
