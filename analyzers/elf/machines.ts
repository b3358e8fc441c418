"use strict";

import machineTable from "./machines.json" with { type: "json" };
import type { ElfOptionEntry } from "./constants.js";

const toMachineEntry = (value: unknown, position: number): ElfOptionEntry => {
  if (Array.isArray(value) && value.length >= 2) {
    const [code, name, description]: unknown[] = value;
    if (typeof code === "number" && typeof name === "string") {
      return typeof description === "string" ? [code, name, description] : [code, name];
    }
  }
  throw new TypeError(`machines.json entry ${position} is not a [code, name, description] tuple.`);
};

const rows: unknown[] = machineTable;

export const ELF_MACHINE: readonly ElfOptionEntry[] = Object.freeze(rows.map(toMachineEntry));
