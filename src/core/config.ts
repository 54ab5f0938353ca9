import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { isMap, isScalar, isSeq, type Node, type YAMLMap } from 'yaml';
import { getNodeRange, parseYaml, type ParsedYaml } from '../parser/yaml.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { ColorMode, OutputFormat } from './reporter.js';

export const CONFIG_FILE_NAME = '.sprig.yml';

export interface SprigConfig {
    format: OutputFormat;
    color: ColorMode;
    printAst: boolean;
    /** Source file extensions (no dots) picked up when a directory is given */
    extensions: string[];
    ignore: string[];
}

export const DEFAULT_CONFIG: SprigConfig = {
    format: 'pretty',
    color: 'auto',
    printAst: false,
    extensions: ['sprig'],
    ignore: []
};

export interface LoadedConfig {
    config: Partial<SprigConfig>;
    diagnostics: Diagnostic[];
}

const FORMATS: readonly OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

function isOneOf<T extends string>(options: readonly T[], value: unknown): value is T {
    return options.some(option => option === value);
}

/**
 * Reads a config file. A missing file is not an error and yields an empty
 * partial config; everything else that goes wrong is reported as a diagnostic.
 */
export function loadConfig(configPath: string, profile?: string): LoadedConfig {
    if (!existsSync(configPath)) {
        return { config: {}, diagnostics: [] };
    }

    const text = readFileSync(configPath, 'utf8');
    return parseConfig(text, configPath, profile);
}

export function parseConfig(text: string, filePath: string, profile?: string): LoadedConfig {
    const { parsed, diagnostics } = parseYaml(text, filePath);
    if (!parsed) return { config: {}, diagnostics };

    const root = parsed.doc.contents;
    if (root === null) return { config: {}, diagnostics };
    if (!isMap(root)) {
        diagnostics.push({
            code: 'CONFIG_NOT_A_MAP',
            message: 'Config file must contain a YAML mapping.',
            severity: 'error',
            file: filePath,
            range: getNodeRange(root, parsed.lineCounter)
        });
        return { config: {}, diagnostics };
    }

    let config = readSettings(root, parsed, [], diagnostics);

    if (profile) {
        const profiles: unknown = root.get('profiles', true);
        const selected: unknown = isMap(profiles) ? profiles.get(profile, true) : undefined;

        if (isMap(selected)) {
            // Profile values shadow the top-level ones
            config = { ...config, ...readSettings(selected, parsed, ['profiles', profile], diagnostics) };
        } else {
            diagnostics.push({
                code: 'CONFIG_PROFILE_MISSING',
                message: `Profile "${profile}" is not defined in ${path.basename(filePath)}.`,
                severity: 'warning',
                file: filePath,
                path: ['profiles', profile]
            });
        }
    }

    return { config, diagnostics };
}

function readSettings(map: YAMLMap, parsed: ParsedYaml, prefix: string[], diagnostics: Diagnostic[]): Partial<SprigConfig> {
    const config: Partial<SprigConfig> = {};

    const invalid = (key: string, node: unknown, expected: string) => {
        diagnostics.push({
            code: 'CONFIG_INVALID_VALUE',
            message: `"${[...prefix, key].join('.')}" must be ${expected}; ignoring it.`,
            severity: 'warning',
            file: parsed.filePath,
            range: getNodeRange(isNode(node) ? node : undefined, parsed.lineCounter),
            path: [...prefix, key]
        });
    };

    const format: unknown = map.get('format', true);
    if (format !== undefined) {
        const value = isScalar(format) ? format.value : undefined;
        if (isOneOf(FORMATS, value)) config.format = value;
        else invalid('format', format, `one of ${FORMATS.join(', ')}`);
    }

    const color: unknown = map.get('color', true);
    if (color !== undefined) {
        const value = isScalar(color) ? color.value : undefined;
        if (isOneOf(COLOR_MODES, value)) config.color = value;
        else invalid('color', color, `one of ${COLOR_MODES.join(', ')}`);
    }

    const printAst: unknown = map.get('printAst', true);
    if (printAst !== undefined) {
        const value = isScalar(printAst) ? printAst.value : undefined;
        if (typeof value === 'boolean') config.printAst = value;
        else invalid('printAst', printAst, 'a boolean');
    }

    for (const key of ['extensions', 'ignore'] as const) {
        const node: unknown = map.get(key, true);
        if (node === undefined) continue;

        const list = readStringList(node);
        if (!list) {
            invalid(key, node, 'a string or a list of strings');
            continue;
        }
        if (key === 'extensions' && list.length === 0) {
            invalid(key, node, 'a non-empty list of extensions');
            continue;
        }
        config[key] = key === 'extensions' ? list.map(ext => ext.replace(/^\./, '')) : list;
    }

    return config;
}

function readStringList(node: unknown): string[] | undefined {
    if (isScalar(node)) {
        return typeof node.value === 'string' ? [node.value] : undefined;
    }
    if (isSeq(node)) {
        const values: string[] = [];
        for (const item of node.items) {
            if (!isScalar(item) || typeof item.value !== 'string') return undefined;
            values.push(item.value);
        }
        return values;
    }
    return undefined;
}

function isNode(value: unknown): value is Node {
    return isScalar(value) || isMap(value) || isSeq(value);
}

/** Defaults, then the config file, then explicit CLI flags. */
export function mergeConfig(fromFile: Partial<SprigConfig>, fromFlags: Partial<SprigConfig>): SprigConfig {
    return {
        format: fromFlags.format ?? fromFile.format ?? DEFAULT_CONFIG.format,
        color: fromFlags.color ?? fromFile.color ?? DEFAULT_CONFIG.color,
        printAst: fromFlags.printAst ?? fromFile.printAst ?? DEFAULT_CONFIG.printAst,
        extensions: fromFlags.extensions ?? fromFile.extensions ?? DEFAULT_CONFIG.extensions,
        // Ignore patterns accumulate
        ignore: [...(fromFile.ignore ?? DEFAULT_CONFIG.ignore), ...(fromFlags.ignore ?? [])]
    };
}
