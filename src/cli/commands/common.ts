import type { Command } from 'commander';

export function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('-d, --dir <directory>', 'Project directory holding .ontoreason.yaml', '.')
    .option('--log-level <level>', 'Log level (logs go to stderr)')
    .option('--pretty', 'Human-readable logs');
}
