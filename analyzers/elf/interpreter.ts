"use strict";

import { findNulTerminator } from "../../binary-utils.js";
import { fail } from "../errors.js";
import type { ElfFormat } from "./image.js";

const PT_INTERP_NAME = "PT_INTERP";
const PATH_DECODER = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** The program interpreter requested by the first PT_INTERP segment, or null without one. */
export function readInterpreterPath(image: ElfFormat): string | null {
  const interp = image.segmentsOfType(PT_INTERP_NAME).find(segment => segment.data.length > 0);
  if (!interp) return null;
  const end = findNulTerminator(interp.data, 0);
  if (end < 0) {
    return fail({ kind: "MalformedInput", reason: `PT_INTERP segment ${interp.index} is not NUL-terminated` });
  }
  try {
    return PATH_DECODER.decode(interp.data.subarray(0, end));
  } catch {
    return fail({ kind: "MalformedInput", reason: `PT_INTERP segment ${interp.index} is not valid UTF-8` });
  }
}
