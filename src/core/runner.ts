import fg from 'fast-glob';
import { existsSync, readFileSync, statSync } from 'fs';
import path from 'path';
import { Lexer } from './expr/tokenizer.js';
import { Parser } from './expr/parser.js';
import type { Program } from './expr/ast.js';
import { evaluate } from './eval/evaluator.js';
import type { Value } from './value/types.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { SprigConfig } from './config.js';

export interface RunResult {
    file: string;
    program?: Program;
    diagnostics: Diagnostic[];
    /** Null when the program was not evaluated or produced nothing */
    value: Value | null;
}

/**
 * Parses and evaluates one source text. The tree is only evaluated when
 * the parse came back clean.
 */
export function runSource(source: string, file: string): RunResult {
    const parser = new Parser(new Lexer(source));
    const program = parser.parseProgram();
    const diagnostics = parser.diagnostics(file);

    if (diagnostics.length > 0) {
        return { file, program, diagnostics, value: null };
    }

    return { file, program, diagnostics, value: evaluate(program) };
}

export function runFile(filePath: string): RunResult {
    if (!existsSync(filePath)) {
        return {
            file: filePath,
            diagnostics: [{
                code: 'FILE_NOT_FOUND',
                message: `No such file: ${filePath}`,
                severity: 'error',
                file: filePath
            }],
            value: null
        };
    }

    try {
        return runSource(readFileSync(filePath, 'utf8'), filePath);
    } catch (e: unknown) {
        return {
            file: filePath,
            diagnostics: [{
                code: 'FILE_READ_ERROR',
                message: e instanceof Error ? e.message : String(e),
                severity: 'error',
                file: filePath
            }],
            value: null
        };
    }
}

/**
 * Expands CLI targets into a sorted, de-duplicated list of source files.
 * Directories contribute every file with a configured extension; anything
 * that is not an existing path is treated as a glob.
 */
export async function collectSources(
    targets: string[],
    options: Pick<SprigConfig, 'extensions' | 'ignore'>,
    cwd: string = process.cwd()
): Promise<string[]> {
    const ignore = ['**/node_modules/**', ...options.ignore];
    const found = new Set<string>();

    for (const target of targets) {
        const absolute = path.resolve(cwd, target);

        if (existsSync(absolute) && statSync(absolute).isDirectory()) {
            const exts = options.extensions.length === 1 ? options.extensions[0] : `{${options.extensions.join(',')}}`;
            const matches = await fg(`**/*.${exts}`, { cwd: absolute, absolute: true, ignore });
            matches.forEach(m => found.add(path.normalize(m)));
        } else if (existsSync(absolute)) {
            found.add(absolute);
        } else {
            const matches = await fg(target, { cwd, absolute: true, ignore });
            if (matches.length === 0) {
                // Keep the path so the caller reports it as missing
                found.add(absolute);
            }
            matches.forEach(m => found.add(path.normalize(m)));
        }
    }

    return Array.from(found).sort();
}
