import type { InputDocument, TaskInput } from '../schema.js';
import type { TaskRecord } from '../types.js';
import type { Person } from './person.js';
import { type ReadonlyTeam, teamPrice } from './team.js';
import { buildTeams } from './team-builder.js';

/**
 * A task with a name and the skills it needs. Teams are filled in once by
 * `makeTeams` and are read-only afterwards.
 */
export class Task {
  readonly name: string;
  readonly skills: readonly string[];
  private assigned: readonly ReadonlyTeam[] = [];

  constructor({ name, skills }: TaskInput) {
    this.name = name;
    this.skills = Object.freeze([...skills]);
  }

  get teams(): readonly ReadonlyTeam[] {
    return this.assigned;
  }

  /**
   * Finds the teams that cover this task's skills, cheapest first
   */
  makeTeams(people: readonly Person[]): void {
    this.assigned = Object.freeze(buildTeams(this.skills, people).map(team => Object.freeze(team)));
  }

  toRecord(): TaskRecord {
    return {
      name: this.name,
      teams: this.assigned.map(team => ({
        peoples: team.map(person => person.name),
        price: teamPrice(team),
      })),
    };
  }

  /**
   * Builds the task list from the `Tasks` list, in input order
   */
  static makeTasks(data: Pick<InputDocument, 'Tasks'>): Task[] {
    return data.Tasks.map(record => new Task(record));
  }

  toString(): string {
    return `Task Name: ${this.name}, Needed skills ${this.skills.join(', ')}`;
  }
}
