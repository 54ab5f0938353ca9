import { parseDocument, LineCounter, type Document, type Node } from 'yaml';
import type { Diagnostic, Range } from '../types/diagnostic.js';

export interface ParsedYaml {
    doc: Document;
    lineCounter: LineCounter;
    filePath: string;
}

export function stripBom(s: string): string {
    return s.charCodeAt(0) === 0xFEFF ? s.slice(1) : s;
}

export function parseYaml(text: string, filePath: string): { parsed?: ParsedYaml, diagnostics: Diagnostic[] } {
    const lineCounter = new LineCounter();
    const diagnostics: Diagnostic[] = [];
    const source = stripBom(text);

    try {
        const doc = parseDocument(source, { lineCounter });

        for (const error of doc.errors) {
            const pos = error.pos[0] ?? 0;
            const end = error.pos[1] ?? pos;

            const startLoc = lineCounter.linePos(pos);
            const endLoc = lineCounter.linePos(end);

            diagnostics.push({
                code: 'CONFIG_SYNTAX_ERROR',
                message: error.message,
                severity: 'error',
                file: filePath,
                range: {
                    start: { line: startLoc.line, col: startLoc.col, offset: pos },
                    end: { line: endLoc.line, col: endLoc.col, offset: end }
                }
            });
        }

        if (doc.errors.length > 0) {
            return { diagnostics };
        }

        return {
            parsed: {
                doc,
                lineCounter,
                filePath
            },
            diagnostics
        };

    } catch (e: unknown) {
        diagnostics.push({
            code: 'CONFIG_PARSE_EXCEPTION',
            message: e instanceof Error ? e.message : String(e),
            severity: 'error',
            file: filePath
        });
        return { diagnostics };
    }
}

export function getNodeRange(node: Node | null | undefined, lineCounter: LineCounter): Range | undefined {
    if (!node || !node.range) return undefined;

    const start = lineCounter.linePos(node.range[0]);
    const end = lineCounter.linePos(node.range[1]);

    return {
        start: { line: start.line, col: start.col, offset: node.range[0] },
        end: { line: end.line, col: end.col, offset: node.range[1] }
    };
}
