import * as fs from 'fs';
import type { Readable } from 'stream';
import { TextDecoder } from 'util';
import { describeError, errnoCode, InputError } from './errors';

export const STDIN_SOURCE = '<stdin>';

export type InputStream = Readable & { isTTY?: boolean };

export interface ReadInputOptions {
  file?: string;
  stdin: InputStream;
}

export interface InputText {
  text: string;
  /** File path, or `<stdin>`. */
  source: string;
}

const decoder = new TextDecoder('utf-8');

export async function readInput(options: ReadInputOptions): Promise<InputText> {
  if (options.file !== undefined) {
    return { text: await readInputFile(options.file), source: options.file };
  }
  return { text: await readStream(options.stdin), source: STDIN_SOURCE };
}

async function readInputFile(file: string): Promise<string> {
  try {
    return decoder.decode(await fs.promises.readFile(file));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new InputError(`File '${file}' does not exist.`);
    }
    throw new InputError(`Error reading file '${file}': ${describeError(error)}`);
  }
}

async function readStream(stdin: InputStream): Promise<string> {
  if (stdin.isTTY) {
    throw new InputError('No input provided. Please provide a file or pipe data.');
  }

  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
    }
  } catch (error) {
    throw new InputError(`Error reading from stdin: ${describeError(error)}`);
  }
  return decoder.decode(Buffer.concat(chunks));
}
