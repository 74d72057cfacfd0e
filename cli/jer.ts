#!/usr/bin/env npx tsx
/**
 * CLI for compiling descriptor models and canonicalizing JER documents.
 *
 * Usage:
 *   npx tsx cli/jer.ts types <model.json>
 *   npx tsx cli/jer.ts canonicalize <model.json> <Module.Type> [input.json]
 *       [--emit-defaults] [--strict-decode]
 *
 * canonicalize reads stdin when no input file is given. JER_MAX_DEPTH
 * overrides the nesting limit for both commands.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { TranscodeOptions } from '../src/codecs/Codec';
import { loadDescriptorModel } from '../src/descriptor/loadDescriptorModel';
import { JerError } from '../src/errors';
import { SchemaCompiler } from '../src/schema/SchemaCompiler';

const USAGE = [
  'Usage:',
  '  jer types <model.json>',
  '  jer canonicalize <model.json> <Module.Type> [input.json] [--emit-defaults] [--strict-decode]',
].join('\n');

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  readStdin(): string;
}

const processIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
};

/** Run one CLI invocation and return its exit code. */
export function run(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
  io: CliIO = processIO,
): number {
  const flags = new Set(argv.filter(arg => arg.startsWith('--')));
  const args = argv.filter(arg => !arg.startsWith('--'));
  const [command, ...rest] = args;

  const unknownFlag = [...flags].find(flag => flag !== '--emit-defaults' && flag !== '--strict-decode');
  if (unknownFlag) {
    io.err(`Error: unknown option ${unknownFlag}`);
    io.err(USAGE);
    return 2;
  }

  const maxDepth = parseMaxDepth(env.JER_MAX_DEPTH);
  if (maxDepth === null) {
    io.err(`Error: JER_MAX_DEPTH must be a positive integer, got '${env.JER_MAX_DEPTH}'`);
    return 2;
  }

  try {
    switch (command) {
      case 'types':
        if (rest.length !== 1) break;
        return listTypes(rest[0], maxDepth, io);
      case 'canonicalize':
        if (rest.length < 2 || rest.length > 3) break;
        return canonicalize(rest[0], rest[1], rest[2], {
          defaultElision: flags.has('--emit-defaults') ? 'emit-all' : 'omit-default',
          missingOnDecode: flags.has('--strict-decode') ? 'error' : 'omit',
          ...(maxDepth !== undefined ? { maxDepth } : {}),
        }, io);
      default:
        break;
    }
  } catch (e) {
    if (e instanceof JerError) {
      io.err(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }

  io.err(USAGE);
  return 2;
}

/** undefined when unset, null when set to something unusable. */
function parseMaxDepth(raw: string | undefined): number | undefined | null {
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

function listTypes(modelPath: string, maxDepth: number | undefined, io: CliIO): number {
  const model = loadDescriptorModel(path.resolve(modelPath));
  const compiler = new SchemaCompiler(model, maxDepth !== undefined ? { maxDepth } : {});
  let failed = 0;
  for (const moduleName of Object.keys(model)) {
    for (const typeName of Object.keys(model[moduleName].types)) {
      const result = compiler.compileType(moduleName, typeName);
      if (result._tag === 'Ok') {
        io.out(`${moduleName}.${typeName}: ok`);
      } else {
        failed++;
        io.out(`${moduleName}.${typeName}: ${result.error.code} ${result.error.message}`);
      }
    }
  }
  return failed > 0 ? 1 : 0;
}

function canonicalize(
  modelPath: string,
  qualifiedName: string,
  inputPath: string | undefined,
  options: Partial<TranscodeOptions>,
  io: CliIO,
): number {
  const dot = qualifiedName.lastIndexOf('.');
  if (dot <= 0 || dot === qualifiedName.length - 1) {
    io.err(`Error: expected <Module.Type>, got '${qualifiedName}'`);
    return 2;
  }
  const moduleName = qualifiedName.slice(0, dot);
  const typeName = qualifiedName.slice(dot + 1);

  const model = loadDescriptorModel(path.resolve(modelPath));
  const compiled = new SchemaCompiler(
    model,
    options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {},
  ).compileType(moduleName, typeName).unwrap();

  let text: string;
  if (inputPath !== undefined) {
    const resolved = path.resolve(inputPath);
    if (!fs.existsSync(resolved)) {
      io.err(`Error: input file not found: ${resolved}`);
      return 1;
    }
    text = fs.readFileSync(resolved, 'utf-8');
  } else {
    text = io.readStdin();
  }

  const decoded = compiled.decodeFromString(text, options).unwrap();
  io.out(compiled.encodeToString(decoded, options).unwrap());
  return 0;
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
