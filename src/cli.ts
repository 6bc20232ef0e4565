#!/usr/bin/env node
import fs from 'node:fs';
import { loadConfig } from './config.js';
import { UsageError, describeError, formatUsage, parseArgs, resolveAlphabet, runCodec } from './commands.js';

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function readInput(file: string | undefined): Promise<Buffer> {
  if (file === undefined || file === '-') return readStdin();
  return Promise.resolve(fs.readFileSync(file));
}

// ── Main ────────────────────────────────────────────────────────

async function main() {
  try {
    const args = parseArgs(process.argv.slice(2)); // skip node + script
    if (args.help) {
      console.log(formatUsage());
      return;
    }

    const alphabet = resolveAlphabet(args.alphabet, loadConfig());
    const input = await readInput(args.file);
    const output = runCodec(input, { decode: args.decode, alphabet });
    process.stdout.write(output);
  } catch (err: unknown) {
    console.error(`Error: ${describeError(err)}`);
    if (err instanceof UsageError) console.error(formatUsage());
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${describeError(err)}`);
  process.exit(1);
});
