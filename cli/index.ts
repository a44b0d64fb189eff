#!/usr/bin/env node
import { Command, Option } from 'commander';
import { dbCommand } from './db';
import { gphotoCommand } from './gphoto';
import { immichCommand } from './immich';

export function buildProgram(): Command {
  const program = new Command('albumporter')
    .description('Carry Google Photos shared-album metadata (owners, members, tags) over to Immich')
    .version('0.1.0')
    .option('--db <path>', 'local store file (ALBUMPORTER_DB_PATH)')
    .option('--log-level <level>', 'debug, info, warn or error (LOG_LEVEL)')
    .addOption(new Option('--log-format <format>', 'log line format (LOG_FORMAT)').choices(['text', 'json']));

  program.addCommand(gphotoCommand());
  program.addCommand(dbCommand());
  program.addCommand(immichCommand());
  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
