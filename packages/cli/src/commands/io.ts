import { readFile } from 'fs/promises';
import { bytesToHex } from '@stratum/crypto';

/**
 * Read a message file as raw bytes
 */
export async function readBytes(path: string): Promise<Uint8Array> {
  return new Uint8Array(await readFile(path));
}

/**
 * Read from stdin until it closes
 */
export async function readStdin(): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? new TextEncoder().encode(chunk) : chunk);
  }
  return new Uint8Array(Buffer.concat(chunks));
}

export type TextEncoding = 'utf-8' | 'hex';

/**
 * Render bytes for output without losing any of them
 *
 * Valid UTF-8 is shown as text; anything else falls back to hex.
 */
export function describeBytes(bytes: Uint8Array): { encoding: TextEncoding; text: string } {
  try {
    return { encoding: 'utf-8', text: new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes) };
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    return { encoding: 'hex', text: bytesToHex(bytes) };
  }
}

/**
 * Read a message from a file, or from stdin when the path is `-`
 */
export async function readInput(path: string): Promise<Uint8Array> {
  return path === '-' ? readStdin() : readBytes(path);
}
