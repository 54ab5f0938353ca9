#!/usr/bin/env node
import { Command, Option } from 'commander';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { CONFIG_FILE_NAME, loadConfig, mergeConfig, type SprigConfig } from './core/config.js';
import { Reporter, type ColorMode, type OutputFormat } from './core/reporter.js';
import { collectSources, runFile, runSource, type RunResult } from './core/runner.js';
import { formatNode } from './core/expr/ast.js';
import type { Diagnostic } from './types/diagnostic.js';

interface CliOptions {
    eval?: string;
    ast?: boolean;
    format?: OutputFormat;
    color?: ColorMode;
    config?: string;
    profile?: string;
    ignore: string[];
}

const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

const program: Command = new Command();

program
    .name('sprig')
    .description('Parse and evaluate Sprig programs')
    .version(pkg.version)
    .argument('[targets...]', 'Source files, directories or globs to run')
    .option('-e, --eval <source>', 'Evaluate the given source text instead of reading files')
    .option('--ast', 'Print the parsed tree of every program')
    .addOption(new Option('--format <format>', 'Output format').choices(['pretty', 'plain', 'json', 'compact']))
    .addOption(new Option('--color <mode>', 'Color output').choices(['auto', 'always', 'never']))
    .option('--config <path>', `Path to a config file (defaults to ${CONFIG_FILE_NAME} in the working directory)`)
    .option('--profile <name>', 'Use a specific profile from the config file')
    .option('--ignore <glob>', 'Ignore files matching the given glob (can be used multiple times)', (val: string, memo: string[]) => { memo.push(val); return memo; }, [])
    .action(async (targets: string[], options: CliOptions) => {
        const configPath = options.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);
        const loaded = loadConfig(configPath, options.profile);

        const config: SprigConfig = mergeConfig(loaded.config, {
            format: options.format,
            color: options.color,
            printAst: options.ast,
            ignore: options.ignore
        });

        const reporter = new Reporter({ color: config.color, format: config.format });
        loaded.diagnostics.forEach(d => reporter.printDiagnostic(d));

        const configErrors = loaded.diagnostics.filter(d => d.severity === 'error');
        if (configErrors.length > 0) {
            reporter.printError(`Invalid config file at ${configPath}`);
            process.exit(1);
        }

        let results: RunResult[];
        if (options.eval !== undefined) {
            results = [runSource(options.eval, '<eval>')];
        } else if (targets.length > 0) {
            if (existsSync(configPath)) {
                reporter.printInfo(`Using config ${configPath}${options.profile ? ` (profile: ${options.profile})` : ''}`);
            }
            const files = await collectSources(targets, config);
            if (files.length === 0) {
                reporter.printWarning('No source files matched the given targets.');
            }
            reporter.printBanner(pkg.version, files.length);
            results = files.map(file => runFile(file));
        } else {
            reporter.printError('Nothing to run. Pass a file, a directory or --eval <source>.');
            program.help({ error: true });
        }

        const allDiagnostics: Diagnostic[] = [...loaded.diagnostics];
        let evaluated = 0;

        for (const result of results) {
            if (options.eval === undefined) {
                reporter.printFileHeader(path.relative(process.cwd(), result.file) || result.file);
            }
            if (config.printAst && result.program) {
                reporter.printAst(formatNode(result.program));
            }
            reporter.printReport(result);

            allDiagnostics.push(...result.diagnostics);
            if (result.diagnostics.length === 0) evaluated++;
        }

        const errors = allDiagnostics.filter(d => d.severity === 'error').length;
        const warnings = allDiagnostics.filter(d => d.severity === 'warning').length;

        if (options.eval === undefined) {
            reporter.printSummary({ files: results.length, evaluated, errors, warnings });
        }

        if (errors > 0) process.exit(1);
    });

await program.parseAsync();
