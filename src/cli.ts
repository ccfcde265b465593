#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { loadConfig } from './config.js';
import { CancelledError, toErrorMessage } from './errors.js';
import { setLogLevel } from './logger.js';
import { createAnalysisRuntime, parseAnalysisRequest, runAnalysis } from './pipeline.js';
import { formatReport } from './report.js';

function getArg(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function printUsage(): void {
  console.log('code-audit: requirements, code, test and documentation analysis');
  console.log('');
  console.log('Usage:');
  console.log('  code-audit analyze --requirements <file> --code <file> [options]');
  console.log('  code-audit auth');
  console.log('');
  console.log('Options:');
  console.log('  --requirements     File with the requirements text');
  console.log('  --code             File with the source code');
  console.log('  --tests            File with the test cases');
  console.log('  --docs             File with the documentation');
  console.log('  --no-security      Skip the security analysis stage');
  console.log('  --json             Output the report as JSON instead of Markdown');
  console.log('  --help             Show this help message');
  console.log('');
  console.log('Gateway settings come from LLM_GATEWAY_* environment variables (or .env).');
}

async function readOptional(path: string | undefined): Promise<string> {
  return path === undefined ? '' : readFile(path, 'utf8');
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printUsage();
    return 0;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const runtime = createAnalysisRuntime(config);

  if (command === 'auth') {
    await runtime.credentials.token();
    const { expiresAt } = runtime.credentials.snapshot();
    console.log(`Token acquired; usable until ${expiresAt === undefined ? 'unknown' : new Date(expiresAt).toISOString()}`);
    return 0;
  }

  if (command === 'analyze') {
    const requirementsPath = getArg(args, 'requirements');
    const codePath = getArg(args, 'code');
    if (!requirementsPath || !codePath) {
      console.error('Error: --requirements and --code are required.');
      return 1;
    }

    const [requirements, code, testCases, documentation] = await Promise.all([
      readFile(requirementsPath, 'utf8'),
      readFile(codePath, 'utf8'),
      readOptional(getArg(args, 'tests')),
      readOptional(getArg(args, 'docs')),
    ]);

    const bundle = parseAnalysisRequest(
      {
        requirements,
        code,
        test_cases: testCases,
        documentation,
        analyze_security: hasFlag(args, 'no-security') ? false : undefined,
      },
      runtime.defaults,
    );

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const report = await runAnalysis(bundle, runtime, { signal: controller.signal });
    console.log(hasFlag(args, 'json') ? JSON.stringify(report, null, 2) : formatReport(report));
    return 0;
  }

  console.error(`Unknown command: ${command}`);
  console.error('Run with --help for usage information.');
  return 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Error:', toErrorMessage(err));
    process.exitCode = err instanceof CancelledError ? 130 : 1;
  },
);
