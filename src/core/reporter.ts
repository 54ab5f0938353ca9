import type { Diagnostic, Severity } from '../types/diagnostic.js';
import { inspect, typeOf, type Value } from './value/types.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
}

export interface FileReport {
    file: string;
    diagnostics: Diagnostic[];
    value: Value | null;
}

export interface SummaryStats {
    files: number;
    evaluated: number;
    errors: number;
    warnings: number;
}

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain' || this.options.format === 'json') return false;

        // auto mode: check environment
        const hasNoColor = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY === true;

        return !hasNoColor && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    private formatContext(path: string[] | undefined): string {
        if (!path || path.length === 0) return '';
        return '\n' + this.colorize(`    ↳ ${path.join(' → ')}`, ansis.dim);
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        const { file, code, message, severity, range, path } = diagnostic;
        const location = range ? `:${range.start.line}:${range.start.col}` : '';

        if (this.options.format === 'json') {
            return JSON.stringify(diagnostic);
        }

        if (this.options.format === 'compact') {
            const severityChar = severity === 'error' ? 'E' : 'W';
            return `${file}${location} [${code}] ${severityChar}: ${message}`;
        }

        const coloredIcon = this.colorize(this.getSeverityIcon(severity), this.getSeverityColor(severity));
        const coloredSeverity = this.colorize(severity.toUpperCase(), this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(`${file}${location}`, ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}${this.formatContext(path)}`;
    }

    formatResult(report: FileReport): string | undefined {
        const { file, value } = report;

        if (this.options.format === 'json') {
            return JSON.stringify({
                file,
                type: value ? typeOf(value) : null,
                value: value ? inspect(value) : null
            });
        }

        // An absent value has nothing to show
        if (!value) return undefined;

        if (this.options.format === 'compact') {
            return `${file} => ${inspect(value)}`;
        }

        return `  ${this.colorize('=>', ansis.dim)} ${this.colorize(inspect(value), ansis.green)}`;
    }

    printBanner(version: string, fileCount: number): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        const header = this.colorize(`┌ sprig ${version}  •  Running ${fileCount} file${fileCount === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printFileHeader(file: string): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        console.log(this.colorize(`▸ ${file}`, ansis.bold));
    }

    printAst(rendered: string): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({ ast: rendered }));
            return;
        }

        console.log(this.colorize(`  ast: ${rendered}`, ansis.dim));
    }

    printDiagnostic(diagnostic: Diagnostic): void {
        console.log(this.formatDiagnostic(diagnostic));
    }

    printReport(report: FileReport): void {
        report.diagnostics.forEach(d => this.printDiagnostic(d));

        const result = this.formatResult(report);
        if (result !== undefined) {
            console.log(result);
        }
    }

    printSummary(stats: SummaryStats): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary: stats,
                timing: { elapsedSeconds: this.getElapsedTime() }
            }));
            return;
        }

        if (this.options.format === 'compact') {
            console.log(`Summary: ${stats.errors} errors, ${stats.warnings} warnings (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);

        const errorsStr = this.colorize(`Errors: ${stats.errors}`, stats.errors > 0 ? ansis.red : ansis.dim);
        const warningsStr = this.colorize(`Warnings: ${stats.warnings}`, stats.warnings > 0 ? ansis.yellow : ansis.dim);
        console.log(`${this.colorize('Files:', ansis.cyan)} ${stats.files}  Evaluated: ${stats.evaluated}  ${errorsStr}  ${warningsStr}`);
        console.log(this.colorize(`Finished in ${this.getElapsedTime()}s`, ansis.dim));
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            console.error(JSON.stringify({ error: message }));
            return;
        }

        console.error(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            console.warn(JSON.stringify({ warning: message }));
            return;
        }

        console.warn(this.colorize(`Warning: ${message}`, ansis.yellow));
    }

    printInfo(message: string): void {
        if (this.options.format === 'json') return;

        console.log(this.colorize(message, ansis.dim));
    }
}
