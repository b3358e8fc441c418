"use strict";

import { ELF_TYPE, describeOption } from "./constants.js";
import type { ElfFormat } from "./image.js";

const TYPE_KINDS: Record<string, string> = {
  ET_NONE: "untyped object",
  ET_REL: "relocatable",
  ET_EXEC: "executable",
  ET_DYN: "shared object",
  ET_CORE: "core file"
};

export function describeExecutable(image: ElfFormat): string {
  const header = image.header();
  const elfType = header.elfType();
  const bits = image.elfClass === "ELF64" ? "64-bit" : "32-bit";
  const endian = image.littleEndian ? "LSB" : "MSB";
  const kind = TYPE_KINDS[elfType.name] ?? describeOption(elfType.code, ELF_TYPE) ?? elfType.name;
  const machine = header.machine();
  return `ELF ${bits} ${endian} ${kind}, ${machine.description ?? machine.name}`;
}
