"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const toHex64 = (value: bigint | number): string => "0x" + value.toString(16);

// Offsets read from the file are bigint; DataView and subarray want plain numbers.
export const toSafeIndex = (value: bigint): number | null => {
  if (value < 0n) return null;
  const num = Number(value);
  return Number.isSafeInteger(num) ? num : null;
};

export const toByteArray = (input: ArrayBuffer | ArrayBufferView): Uint8Array => {
  if (input instanceof Uint8Array) return input;
  if (ArrayBuffer.isView(input)) return new Uint8Array(input.buffer, input.byteOffset, input.byteLength);
  return new Uint8Array(input);
};

export const viewOf = (bytes: Uint8Array): DataView =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

export const findNulTerminator = (bytes: Uint8Array, start: number): number => {
  for (let index = start; index < bytes.length; index += 1) {
    if (bytes[index] === 0) return index;
  }
  return -1;
};

export const startsWithBytes = (bytes: Uint8Array, signature: readonly number[]): boolean =>
  bytes.length >= signature.length && signature.every((value, index) => bytes[index] === value);
