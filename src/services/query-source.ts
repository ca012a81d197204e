import fs from 'fs';
import path from 'path';
import { InputError } from '../errors/scrape-error';

export const DEFAULT_INPUT_FILE = 'input.txt';

export interface QuerySourceOptions {
  search?: string;
  inputFile?: string;
  cwd?: string;
}

export function parseQueryLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * A single `search` wins; otherwise every non-blank line of the input file is
 * a query. Throws `InputError` when neither yields anything.
 */
export function resolveQueries(options: QuerySourceOptions = {}): string[] {
  const search = options.search?.trim();
  if (search) {
    return [search];
  }

  const inputFile = path.resolve(options.cwd ?? process.cwd(), options.inputFile ?? DEFAULT_INPUT_FILE);
  const queries = fs.existsSync(inputFile) ? parseQueryLines(fs.readFileSync(inputFile, 'utf-8')) : [];

  if (queries.length === 0) {
    throw new InputError(
      `You must either pass the -s search argument, or add searches to ${path.basename(inputFile)}`,
    );
  }
  return queries;
}
