import { teamPrice, type Task } from './roster/index.js';

export interface TaskSummary {
  name: string;
  teamCount: number;
  cheapest?: { names: string[]; price: number };
  skills: readonly string[];
}

export function formatPrice(price: number): string {
  return price.toLocaleString('en-US');
}

export function summarizeTask(task: Task): TaskSummary {
  const [first] = task.teams;
  return {
    name: task.name,
    teamCount: task.teams.length,
    cheapest: first ? { names: first.map(p => p.name), price: teamPrice(first) } : undefined,
    skills: task.skills,
  };
}

export function formatTaskSummary(summary: TaskSummary): string {
  if (!summary.cheapest) {
    return `${summary.name}: no team covers ${summary.skills.join(', ')}`;
  }
  const plural = summary.teamCount === 1 ? 'team' : 'teams';
  return `${summary.name}: ${summary.teamCount} ${plural}, cheapest ${formatPrice(summary.cheapest.price)} (${summary.cheapest.names.join(', ')})`;
}

/**
 * One line per task followed by a totals line
 */
export function getRunSummary(tasks: readonly Task[]): string {
  const lines = tasks.map(task => formatTaskSummary(summarizeTask(task)));
  const teamTotal = tasks.reduce((sum, task) => sum + task.teams.length, 0);
  lines.push(
    `${tasks.length} ${tasks.length === 1 ? 'task' : 'tasks'}, ${teamTotal} ${teamTotal === 1 ? 'team' : 'teams'}`
  );
  return lines.join('\n');
}
