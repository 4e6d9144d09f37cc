/**
 * Path lists piped on standard input.
 */
import { isSidecarPath } from '../checksum/sidecar.js';

export type PathListSource = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Split newline-delimited text into paths.
 * Lines are trimmed; blank lines and sidecar paths are dropped.
 */
export function parsePathList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !isSidecarPath(line));
}

/**
 * Read a path list from stdin.
 * Resolves to an empty list when stdin is an interactive terminal.
 */
export function readPathsFromStdin(stream: PathListSource = process.stdin): Promise<string[]> {
  return new Promise((resolve, reject) => {
    if (stream.isTTY) {
      resolve([]);
      return;
    }
    let data = '';
    stream.setEncoding('utf-8');
    stream.on('data', (chunk: string) => { data += chunk; });
    stream.on('end', () => resolve(parsePathList(data)));
    stream.on('error', reject);
  });
}
