#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { useColors } from '../utils/debug.js';
import {
  type CommandResult,
  runMatch,
  runShow,
  runTrace,
  runWords,
} from './commands.js';

function report(result: CommandResult) {
  for (const line of result.lines) {
    console.log(line);
  }
  process.exitCode = result.exitCode;
}

const parser = yargs(hideBin(process.argv))
  .scriptName('deriv-regex')
  .option('color', {
    type: 'boolean',
    description: 'Color the output',
    default: process.stdout.isTTY,
  })
  .option('simplify', {
    type: 'boolean',
    description:
      'Canonicalize each derivative as it is built ' +
      '(--no-simplify shows the bare equations)',
    default: true,
  })
  .middleware((args) => useColors(args.color))
  .command({
    command: 'match <pattern> [inputs..]',
    describe: 'check whether each input is matched by the pattern',
    builder: (yargs) =>
      yargs
        .positional('pattern', {
          type: 'string',
          describe: 'the pattern text',
          demandOption: true,
        })
        .positional('inputs', {
          type: 'string',
          array: true,
          describe: 'inputs to test',
          default: [],
        })
        .option('verbose', {
          alias: 'v',
          type: 'boolean',
          description: 'Show the derivative after every symbol',
          default: false,
        }),
    handler: (args) =>
      report(
        runMatch(args.pattern, args.inputs, {
          simplify: args.simplify,
          verbose: args.verbose,
        })
      ),
  })
  .command({
    command: 'trace <pattern> <input>',
    describe: 'print the pattern left to match after each input symbol',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .positional('input', { type: 'string', demandOption: true }),
    handler: (args) =>
      report(runTrace(args.pattern, args.input, { simplify: args.simplify })),
  })
  .command({
    command: 'words <pattern>',
    describe: 'list the words the pattern matches, shortest first',
    builder: (yargs) =>
      yargs
        .positional('pattern', { type: 'string', demandOption: true })
        .option('max-length', {
          alias: 'n',
          type: 'number',
          description: 'Longest word to list',
          default: 4,
        }),
    handler: (args) =>
      report(
        runWords(args.pattern, args.maxLength, { simplify: args.simplify })
      ),
  })
  .command({
    command: 'show <pattern>',
    describe: 'print the parsed pattern and what is known about it',
    builder: (yargs) =>
      yargs.positional('pattern', { type: 'string', demandOption: true }),
    handler: (args) => report(runShow(args.pattern)),
  })
  .demandCommand(1)
  .strict();

parser.parseSync();
