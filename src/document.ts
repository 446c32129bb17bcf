import { readFileSync, writeFileSync, existsSync, statSync } from 'fs';
import { parse, stringify } from 'yaml';
import { parseInputDocument, type InputDocument } from './schema.js';
import { Person, Task } from './roster/index.js';
import type { OutputDocument } from './types.js';
import { warning } from './utils/chalk.js';

export interface Roster {
  tasks: Task[];
  people: Person[];
}

/**
 * Reads and validates the input document.
 * A missing file is reported, but the read is still attempted and its error propagates.
 */
export function loadDocument(path: string): InputDocument {
  if (!existsSync(path) || !statSync(path).isFile()) {
    console.error(warning(`Error: ${path} is not path to file`));
  }

  const content = readFileSync(path, 'utf-8');
  return parseInputDocument(parse(content));
}

export function makeRoster(data: InputDocument): Roster {
  return {
    tasks: Task.makeTasks(data),
    people: Person.makePeople(data),
  };
}

export function toOutputDocument(tasks: readonly Task[]): OutputDocument {
  return { Tasks: tasks.map(task => task.toRecord()) };
}

export function toYaml(tasks: readonly Task[]): string {
  return stringify(toOutputDocument(tasks));
}

export function saveYaml(tasks: readonly Task[], outFile: string): void {
  writeFileSync(outFile, toYaml(tasks), 'utf-8');
}
