import { Command } from 'commander';
import { runSetup } from '../control-plane/orchestrator.js';

export function buildCli(): Command {
  const program = new Command();

  program
    .name('devsetup')
    .description(
      'Set up or refresh the local development environment of the Python application in the current directory.\n\n' +
      'Locates a Python interpreter, creates .venv, pulls the latest source when the tree is clean,\n' +
      'installs the selected requirements files and the application itself, and optionally the UI.\n' +
      'Everything is asked interactively; a log of the run is written to the temp directory.'
    )
    .version('0.1.0')
    .action(async () => {
      process.exitCode = await runSetup();
    });

  return program;
}
