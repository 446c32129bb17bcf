export { Person } from './person.js';
export { Task } from './task.js';
export { buildTeams, findUniqueSkillPeople, pruneRedundant } from './team-builder.js';
export { teamPrice, coveredSkills } from './team.js';
export type { Team, ReadonlyTeam } from './team.js';
