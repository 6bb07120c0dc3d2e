import { toString } from "uint8arrays";

export const bytesToHex = (bytes: Uint8Array): string => toString(bytes, "base16");

export const isZero = (bytes: Uint8Array): boolean => bytes.every((b) => b === 0);
