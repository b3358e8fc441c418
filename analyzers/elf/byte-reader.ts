"use strict";

import { fail } from "../errors.js";
import type { ElfEncoding } from "./layout.js";

export const requireBytes = (view: DataView, offset: number, size: number): void => {
  const shortfall = offset + size - view.byteLength;
  if (shortfall > 0) fail({ kind: "Incomplete", needed: shortfall });
};

/**
 * Sequential reader over a DataView. Every read checks that its bytes are present and
 * fails with Incomplete carrying the exact shortfall otherwise.
 */
export class ByteCursor {
  private readonly view: DataView;
  private readonly encoding: ElfEncoding;
  private position: number;

  constructor(view: DataView, offset: number, encoding: ElfEncoding) {
    this.view = view;
    this.position = offset;
    this.encoding = encoding;
  }

  get offset(): number {
    return this.position;
  }

  require(size: number): this {
    requireBytes(this.view, this.position, size);
    return this;
  }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  u16(): number {
    this.require(2);
    const value = this.view.getUint16(this.position, this.encoding.littleEndian);
    this.position += 2;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.position, this.encoding.littleEndian);
    this.position += 4;
    return value;
  }

  u64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.position, this.encoding.littleEndian);
    this.position += 8;
    return value;
  }

  // Elf_Addr, Elf_Off and Elf_Xword: u32 or u64 depending on class, widened to bigint.
  word(): bigint {
    return this.encoding.layout.wordSize === 8 ? this.u64() : BigInt(this.u32());
  }

  bytes(length: number): Uint8Array {
    this.require(length);
    const start = this.view.byteOffset + this.position;
    const out = new Uint8Array(this.view.buffer, start, length).slice();
    this.position += length;
    return out;
  }
}
