import type { Person } from './person.js';
import {
  type Team,
  coveredSkills,
  includesPerson,
  isSubset,
  relevantSkills,
  setsEqual,
  sortByName,
  teamPrice,
  teamsEqual,
} from './team.js';

/**
 * Candidates who are the only holder of at least one required skill.
 * Every covering team has to include them.
 */
export function findUniqueSkillPeople(
  candidates: readonly Person[],
  required: ReadonlySet<string>
): Person[] {
  const holders = new Map<string, Person[]>();
  for (const skill of required) {
    holders.set(skill, candidates.filter(p => p.skills.includes(skill)));
  }

  const unique: Person[] = [];
  for (const people of holders.values()) {
    if (people.length === 1 && !includesPerson(unique, people[0])) {
      unique.push(people[0]);
    }
  }
  return unique;
}

/**
 * Drops members whose skills the rest of the team already provides.
 *
 * Removable members are picked against a snapshot of the full team, then
 * removed one at a time; a removal that breaks coverage is undone.
 */
export function pruneRedundant(team: readonly Person[], required: ReadonlySet<string>): Team {
  const target = coveredSkills(team, required);
  const snapshot = [...team];
  const removable = snapshot.filter((_, i) =>
    setsEqual(coveredSkills(snapshot.filter((__, j) => j !== i), required), target)
  );

  let pruned = [...snapshot];
  for (const person of removable) {
    const index = pruned.findIndex(member => member.equals(person));
    const without = [...pruned.slice(0, index), ...pruned.slice(index + 1)];
    pruned = setsEqual(coveredSkills(without, required), target) ? without : [...without, person];
  }
  return pruned;
}

/**
 * Searches the roster for teams whose combined skills cover `skills`.
 *
 * Each candidate seeds a team with the unique-skill people; other candidates
 * that bring a missing skill are added in roster order. Once the team covers
 * every skill it is pruned, recorded, and the seed is rebuilt so the scan can
 * find more teams for the same candidate. Returns deduplicated, name-sorted
 * teams ordered by price (stable for equal prices).
 */
export function buildTeams(skills: readonly string[], people: readonly Person[]): Team[] {
  const required: ReadonlySet<string> = new Set(skills);
  const candidates = people.filter(p => p.skills.some(skill => required.has(skill)));
  const uniquePeople = findUniqueSkillPeople(candidates, required);
  const teams: Team[] = [];

  const record = (team: Team): void => {
    if (!teams.some(existing => teamsEqual(existing, team))) {
      teams.push(team);
    }
  };

  const seed = (current: Person): { team: Team; covered: Set<string> } => {
    const team = [...uniquePeople];
    if (!includesPerson(team, current)) {
      team.push(current);
    }
    return { team, covered: coveredSkills(team, required) };
  };

  for (const current of candidates) {
    let { team, covered } = seed(current);

    if (setsEqual(covered, required)) {
      record(sortByName(team));
      continue;
    }

    for (const other of candidates) {
      if (other.equals(current) || includesPerson(team, other)) {
        continue;
      }

      const otherSkills = relevantSkills(other, required);

      // one person covers the whole task
      if (setsEqual(otherSkills, required)) {
        record([other]);
        break;
      }

      if (!isSubset(otherSkills, covered)) {
        otherSkills.forEach(skill => covered.add(skill));
        team.push(other);
      }

      if (setsEqual(covered, required)) {
        record(sortByName(pruneRedundant(team, required)));
        ({ team, covered } = seed(current));
      }
    }
  }

  return teams
    .map((team, order) => ({ team, order, price: teamPrice(team) }))
    .sort((a, b) => a.price - b.price || a.order - b.order)
    .map(entry => entry.team);
}
