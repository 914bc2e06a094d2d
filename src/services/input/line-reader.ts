// Line-by-line input from standard input or a list of files read as one stream

import * as fs from 'fs/promises';
import * as readline from 'readline';
import { once } from 'events';
import type { Readable, Writable } from 'stream';
import { InputError } from '../../core/errors.js';

/**
 * Where lines come from
 */
export interface LineSource {
  /** Files read in order; standard input when empty */
  files: string[];
  stdin: Readable;
  /** Called for each file that cannot be read; reading continues with the next */
  onError: (error: InputError) => void;
}

function linesOf(input: Readable): AsyncIterable<string> {
  return readline.createInterface({ input, crlfDelay: Infinity });
}

async function* readFileLines(file: string): AsyncGenerator<string> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(file, 'r');
  } catch (error) {
    throw new InputError(file, error);
  }

  try {
    const stat = await handle.stat();
    if (stat.isDirectory()) {
      throw new InputError(file, new Error('Is a directory'));
    }
    yield* linesOf(handle.createReadStream({ autoClose: false }));
  } finally {
    await handle.close();
  }
}

/**
 * Yield input lines without their terminators
 */
export async function* readLines(source: LineSource): AsyncGenerator<string> {
  if (source.files.length === 0) {
    yield* linesOf(source.stdin);
    return;
  }

  for (const file of source.files) {
    try {
      yield* readFileLines(file);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      source.onError(error);
    }
  }
}

/**
 * Write one line, waiting for the stream to drain when its buffer is full
 */
export async function writeLine(output: Writable, line: string): Promise<void> {
  if (!output.write(`${line}\n`)) {
    await once(output, 'drain');
  }
}
