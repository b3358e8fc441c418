"use strict";

import { toByteArray } from "../binary-utils.js";
import { fail } from "./errors.js";
import { decodeElf } from "./elf/index.js";
import { ELF_MAGIC_BYTES } from "./elf/ident.js";
import type { Executable } from "./elf/image.js";
import type { ElfDecodeOptions } from "./elf/types.js";
import { detectContainerFormat, isTruncatedSignature } from "./format-detectors.js";

/**
 * Entry point: sniffs the container signature and decodes ELF images. Other known
 * executable containers are rejected with UnsupportedFormat, anything else with
 * MalformedInput.
 */
export function decodeExecutable(input: ArrayBuffer | ArrayBufferView, options: ElfDecodeOptions = {}): Executable {
  const bytes = toByteArray(input);
  const container = detectContainerFormat(bytes);
  if (container?.format === "elf") return decodeElf(bytes, options);
  if (container) return fail({ kind: "UnsupportedFormat", format: container.label });
  // A cut-off ELF magic goes to the class detector, which reports the shortfall.
  if (bytes.length > 0 && isTruncatedSignature(bytes, ELF_MAGIC_BYTES)) return decodeElf(bytes, options);
  return fail({ kind: "MalformedInput", reason: "unrecognized executable signature" });
}
