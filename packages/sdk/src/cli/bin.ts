#!/usr/bin/env node

import { parseArgs, splitList } from './args.js';
import { check } from './commands/check.js';
import { evaluate } from './commands/evaluate.js';
import { rules } from './commands/rules.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
ownergate - Boolean approval rules for CODEOWNERS

Usage:
  ownergate <command> [options]

Commands:
  check [--pr <number>]             Check a pull request on GitHub
  evaluate <codeowners>             Evaluate rules locally
  rules <codeowners>                List #@BOOL rules and flag malformed ones
  version                           Show version information
  help                              Show this help message

Global Options:
  --json        Output as JSON
  --verbose     Verbose output
  --help, -h    Show help

Command Options:
  check:
    --pr <number>       Pull request number (default: from GITHUB_EVENT_PATH)
    --config <path>     Config file (default: ownergate.config.yaml)

  evaluate:
    --files <list>      Changed files, comma separated
    --approvers <list>  Approving usernames, comma separated
    --teams <path>      YAML mapping of team slug to members

Environment:
  GITHUB_TOKEN, GITHUB_REPOSITORY, GITHUB_EVENT_PATH, GITHUB_API_URL,
  OWNERGATE_CODEOWNERS_PATH, OWNERGATE_LOG_LEVEL

Exit Codes:
  0  All boolean rules satisfied
  1  Rules not satisfied, or the check failed
  2  Usage error (invalid arguments)

Examples:
  ownergate check
  ownergate check --pr 42 --json
  ownergate evaluate .github/CODEOWNERS --files src/a.ts --approvers alice --teams teams.yaml
  ownergate rules .github/CODEOWNERS
`);
}

function printVersion(): void {
  console.log(`ownergate v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const { command, positionals, flags, options } = parseArgs(args);

  if (flags['help'] || command === 'help') {
    printHelp();
    process.exit(0);
  }

  if (flags['version'] || command === 'version') {
    printVersion();
    process.exit(0);
  }

  switch (command) {
    case 'check': {
      let pr: number | undefined;
      if (options['pr'] !== undefined) {
        pr = Number(options['pr']);
        if (!Number.isInteger(pr) || pr <= 0) {
          console.error(`Invalid pull request number: ${options['pr']}`);
          process.exit(2);
        }
      }
      const result = await check({
        pr,
        configPath: options['config'],
        json: flags['json'],
        verbose: flags['verbose'],
      });
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'evaluate': {
      if (positionals.length < 1) {
        console.error('Usage: ownergate evaluate <codeowners> --files <list> [--approvers <list>] [--teams <path>]');
        process.exit(2);
      }
      const result = await evaluate({
        codeowners: positionals[0],
        files: splitList(options['files']),
        approvers: splitList(options['approvers']),
        teams: options['teams'],
        json: flags['json'],
        verbose: flags['verbose'],
      });
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'rules': {
      if (positionals.length < 1) {
        console.error('Usage: ownergate rules <codeowners>');
        process.exit(2);
      }
      const result = await rules({ codeowners: positionals[0], json: flags['json'] });
      process.exit(result.valid ? 0 : 1);
      break;
    }

    case '': {
      console.log('ownergate - Boolean approval rules for CODEOWNERS');
      console.log('');
      console.log('Run "ownergate help" for usage information.');
      process.exit(0);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Run "ownergate help" for usage information.');
      process.exit(2);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
