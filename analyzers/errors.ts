"use strict";

import { toHex32, toHex64 } from "../binary-utils.js";

export type DecodeFailure =
  | { kind: "UnsupportedClass"; classByte: number }
  | { kind: "UnsupportedFormat"; format: string }
  | { kind: "MalformedInput"; reason: string }
  | { kind: "Incomplete"; needed: number }
  | { kind: "IncompleteUnknown" }
  | { kind: "OutOfBounds"; what: string; offset: bigint; size: bigint; length: number }
  | { kind: "SegmentType"; raw: number }
  | { kind: "SegmentFlag"; raw: number }
  | { kind: "SectionType"; raw: number }
  | { kind: "SectionFlag"; raw: bigint }
  | { kind: "UnknownElfType"; raw: number }
  | { kind: "UnknownMachine"; raw: number };

export type DecodeFailureKind = DecodeFailure["kind"];

export const describeFailure = (failure: DecodeFailure): string => {
  switch (failure.kind) {
    case "UnsupportedClass":
      return `Unsupported ELF class value ${failure.classByte}`;
    case "UnsupportedFormat":
      return `Unsupported executable format: ${failure.format}`;
    case "MalformedInput":
      return `Malformed input: ${failure.reason}`;
    case "Incomplete":
      return `Not enough bytes, ${failure.needed} bytes needed`;
    case "IncompleteUnknown":
      return "Not enough bytes, unknown bytes needed";
    case "OutOfBounds":
      return (
        `${failure.what} [${toHex64(failure.offset)}, +${failure.size.toString()}) ` +
        `lies outside the ${failure.length}-byte input`
      );
    case "SegmentType":
      return `Segment type ${toHex32(failure.raw)} not resolved`;
    case "SegmentFlag":
      return `Segment flags ${toHex32(failure.raw)} invalid`;
    case "SectionType":
      return `Section type ${toHex32(failure.raw)} not resolved`;
    case "SectionFlag":
      return `Section flags ${toHex64(failure.raw)} invalid`;
    case "UnknownElfType":
      return `ELF object type ${toHex32(failure.raw)} not recognized`;
    case "UnknownMachine":
      return `ELF machine ${toHex32(failure.raw)} not recognized`;
  }
};

export class ExecutableDecodeError extends Error {
  readonly failure: DecodeFailure;

  constructor(failure: DecodeFailure) {
    super(describeFailure(failure));
    this.name = "ExecutableDecodeError";
    this.failure = failure;
  }

  get kind(): DecodeFailureKind {
    return this.failure.kind;
  }
}

export function fail(failure: DecodeFailure): never {
  throw new ExecutableDecodeError(failure);
}

export const isDecodeFailure = <K extends DecodeFailureKind>(
  error: unknown,
  kind: K
): error is ExecutableDecodeError & { failure: Extract<DecodeFailure, { kind: K }> } =>
  error instanceof ExecutableDecodeError && error.failure.kind === kind;
