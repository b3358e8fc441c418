"use strict";

import { startsWithBytes } from "../binary-utils.js";
import { ELF_MAGIC_BYTES } from "./elf/ident.js";

export type ContainerFormat = "elf" | "pe" | "mz" | "mach-o" | "mach-o-fat";

interface ContainerSignature {
  format: ContainerFormat;
  label: string;
  bytes: readonly number[];
}

// Mach-O magics are listed in both byte orders.
const SIGNATURES: readonly ContainerSignature[] = [
  { format: "elf", label: "ELF", bytes: ELF_MAGIC_BYTES },
  { format: "pe", label: "PE", bytes: [0x50, 0x45, 0x00, 0x00] },
  { format: "mz", label: "MS-DOS/PE (MZ)", bytes: [0x4d, 0x5a] },
  { format: "mach-o", label: "Mach-O 32-bit", bytes: [0xfe, 0xed, 0xfa, 0xce] },
  { format: "mach-o", label: "Mach-O 32-bit", bytes: [0xce, 0xfa, 0xed, 0xfe] },
  { format: "mach-o", label: "Mach-O 64-bit", bytes: [0xfe, 0xed, 0xfa, 0xcf] },
  { format: "mach-o", label: "Mach-O 64-bit", bytes: [0xcf, 0xfa, 0xed, 0xfe] },
  { format: "mach-o-fat", label: "Mach-O universal (Fat)", bytes: [0xca, 0xfe, 0xba, 0xbe] },
  { format: "mach-o-fat", label: "Mach-O universal (Fat)", bytes: [0xbe, 0xba, 0xfe, 0xca] }
];

export interface ContainerMatch {
  format: ContainerFormat;
  label: string;
}

export const detectContainerFormat = (bytes: Uint8Array): ContainerMatch | null => {
  const match = SIGNATURES.find(signature => startsWithBytes(bytes, signature.bytes));
  return match ? { format: match.format, label: match.label } : null;
};

// True when `bytes` is too short to hold the signature but agrees with it so far.
export const isTruncatedSignature = (bytes: Uint8Array, signature: readonly number[]): boolean =>
  bytes.length < signature.length && bytes.every((value, index) => signature[index] === value);
