/**
 * Text File Reader
 *
 * Decides whether a file is text and, if so, returns it decoded as UTF-8.
 * Anything binary, empty, oversized or undecodable comes back as null so
 * the caller can list the file without its contents.
 */

import { readFile, stat } from 'node:fs/promises';

import { getExtension } from '../signatures/classifier.js';
import type { Logger } from '../utils/logger.js';
import { BINARY_EXTENSIONS } from './types.js';

/** Bytes inspected when sniffing for binary content */
const SNIFF_BYTES = 1024;

/** Share of NUL and high bytes above which undecodable content is binary */
const SUSPICIOUS_RATIO = 0.3;

/** Leading bytes of common binary formats */
const BINARY_SIGNATURES: readonly Uint8Array[] = [
  Uint8Array.of(0x00),
  Uint8Array.of(0xff, 0xd8, 0xff), // JPEG
  Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a), // PNG
  Uint8Array.of(0x47, 0x49, 0x46, 0x38, 0x37, 0x61), // GIF87a
  Uint8Array.of(0x47, 0x49, 0x46, 0x38, 0x39, 0x61), // GIF89a
  Uint8Array.of(0x25, 0x50, 0x44, 0x46), // %PDF
  Uint8Array.of(0x50, 0x4b, 0x03, 0x04), // ZIP
];

function startsWith(chunk: Uint8Array, prefix: Uint8Array): boolean {
  if (chunk.length < prefix.length) return false;
  return prefix.every((byte, i) => chunk[i] === byte);
}

function isValidUtf8(bytes: Uint8Array, partial: boolean): boolean {
  try {
    // stream: true tolerates a multi-byte character cut off at the end
    new TextDecoder('utf-8', { fatal: true }).decode(bytes, { stream: partial });
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a file's extension marks it as binary.
 */
export function isBinaryExtension(filePath: string): boolean {
  return BINARY_EXTENSIONS.has(getExtension(filePath));
}

/**
 * Sniff the first bytes of a file for binary content.
 *
 * Binary if the chunk starts with a known binary signature, or if it is
 * not valid UTF-8 and more than 30% of it is NUL or high (> 0x7f) bytes.
 */
export function isBinaryContent(buffer: Uint8Array): boolean {
  const chunk = buffer.subarray(0, SNIFF_BYTES);
  if (chunk.length === 0) {
    return false;
  }

  if (BINARY_SIGNATURES.some((signature) => startsWith(chunk, signature))) {
    return true;
  }

  if (isValidUtf8(chunk, chunk.length < buffer.length) && !chunk.includes(0x00)) {
    return false;
  }

  let suspicious = 0;
  for (const byte of chunk) {
    if (byte === 0x00 || byte > 0x7f) {
      suspicious++;
    }
  }
  return suspicious > chunk.length * SUSPICIOUS_RATIO;
}

/**
 * Read a file as UTF-8 text.
 *
 * @param absolutePath - File to read
 * @param maxBytes - Files larger than this are skipped
 * @returns The decoded text, or null when the file is binary, empty,
 *          too large, not valid UTF-8 or unreadable
 */
export async function readTextFile(
  absolutePath: string,
  maxBytes: number,
  logger?: Logger
): Promise<string | null> {
  if (isBinaryExtension(absolutePath)) {
    return null;
  }

  try {
    const { size } = await stat(absolutePath);
    if (size === 0) {
      return null;
    }
    if (size > maxBytes) {
      logger?.warn(`Skipping ${absolutePath}: exceeds size limit`);
      return null;
    }

    const buffer = await readFile(absolutePath);
    if (isBinaryContent(buffer)) {
      return null;
    }

    if (!isValidUtf8(buffer, false)) {
      logger?.warn(`Skipping ${absolutePath}: not valid UTF-8`);
      return null;
    }
    return new TextDecoder('utf-8').decode(buffer);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.warn(`Error reading ${absolutePath}: ${message}`);
    return null;
  }
}
