import { loadDocument, makeRoster, saveYaml } from './document.js';
import type { Task } from './roster/index.js';
import type { InputDocument } from './schema.js';
import type { RunOptions } from './types.js';

/**
 * Builds teams for every task in a validated document.
 * Tasks are processed in input order; any failure aborts the run.
 */
export function assignTeams(data: InputDocument): Task[] {
  const { tasks, people } = makeRoster(data);

  for (const task of tasks) {
    task.makeTeams(people);
  }

  return tasks;
}

/**
 * Reads the input document, builds teams and writes the result
 */
export function runAssignment(options: RunOptions): Task[] {
  const tasks = assignTeams(loadDocument(options.input));
  saveYaml(tasks, options.output);
  return tasks;
}
