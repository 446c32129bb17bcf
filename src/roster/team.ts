import { Person } from './person.js';

// Ordered by name once finalized
export type Team = Person[];

// A finalized team as handed out by a task
export type ReadonlyTeam = readonly Person[];

export function teamPrice(team: readonly Person[]): number {
  return team.reduce((sum, person) => sum + person.salary, 0);
}

export function includesPerson(team: readonly Person[], person: Person): boolean {
  return team.some(member => member.equals(person));
}

export function teamsEqual(a: readonly Person[], b: readonly Person[]): boolean {
  return a.length === b.length && a.every((person, i) => person.equals(b[i]));
}

export function sortByName(team: Team): Team {
  return team.sort(Person.compare);
}

/**
 * The subset of a person's skills that the task asks for
 */
export function relevantSkills(person: Person, required: ReadonlySet<string>): Set<string> {
  return new Set(person.skills.filter(skill => required.has(skill)));
}

/**
 * Union of every member's relevant skills
 */
export function coveredSkills(team: readonly Person[], required: ReadonlySet<string>): Set<string> {
  const covered = new Set<string>();
  for (const person of team) {
    for (const skill of relevantSkills(person, required)) {
      covered.add(skill);
    }
  }
  return covered;
}

export function setsEqual(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

export function isSubset(subset: ReadonlySet<string>, of: ReadonlySet<string>): boolean {
  for (const item of subset) {
    if (!of.has(item)) return false;
  }
  return true;
}
