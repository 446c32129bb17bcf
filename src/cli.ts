import ora from 'ora';
import { loadConfig } from './config.js';
import { parseArgs, USAGE, type CliArgs } from './cli-args.js';
import { loadDocument, saveYaml } from './document.js';
import { CliUsageError } from './errors.js';
import { assignTeams } from './runner.js';
import { getRunSummary } from './report.js';
import { error, header, label, muted, success } from './utils/chalk.js';

export interface CliOptions {
  configPath?: string;
}

/**
 * Runs the command line and returns the process exit code
 */
export function run(argv: readonly string[], options: CliOptions = {}): number {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(error(err.message));
      console.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(options.configPath);
  const input = args.input || config.paths.input;
  const output = args.output || config.paths.output;

  console.log(label('Input file'), input);
  console.log(label('Output file'), output);

  try {
    // Loaded before the spinner so file warnings print on their own line
    const data = loadDocument(input);

    const spinner = ora('Building teams...').start();
    try {
      const tasks = assignTeams(data);
      saveYaml(tasks, output);
      spinner.succeed(success(`Saved ${output}`));

      if (config.report.enabled) {
        console.log(header('\nSummary'));
        console.log(muted(getRunSummary(tasks)));
      }
    } catch (err) {
      spinner.fail('Failed');
      throw err;
    }
  } catch (err) {
    console.error(error('Fatal error:'), err instanceof Error ? err.message : String(err));
    return 1;
  }

  return 0;
}
