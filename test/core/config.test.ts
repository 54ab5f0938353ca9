import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import path from 'path';
import { DEFAULT_CONFIG, loadConfig, mergeConfig, parseConfig } from '../../src/core/config.js';

const projectDir = fileURLToPath(new URL('../fixtures/project', import.meta.url));

describe('parseConfig', () => {
    it('reads every supported setting', () => {
        const text = [
            'format: json',
            'color: never',
            'printAst: true',
            'extensions: [sp, .sprig]',
            "ignore: 'vendor/**'",
            ''
        ].join('\n');

        const { config, diagnostics } = parseConfig(text, '.sprig.yml');

        expect(diagnostics).toEqual([]);
        expect(config).toEqual({
            format: 'json',
            color: 'never',
            printAst: true,
            extensions: ['sp', 'sprig'],
            ignore: ['vendor/**']
        });
    });

    it('warns about values of the wrong kind and drops them', () => {
        const { config, diagnostics } = parseConfig('format: fancy\nprintAst: yes\n', '.sprig.yml');

        expect(config).toEqual({});
        expect(diagnostics.map(d => [d.code, d.severity, d.message])).toEqual([
            ['CONFIG_INVALID_VALUE', 'warning', '"format" must be one of pretty, plain, json, compact; ignoring it.'],
            ['CONFIG_INVALID_VALUE', 'warning', '"printAst" must be a boolean; ignoring it.']
        ]);
        expect(diagnostics[0].range?.start).toEqual({ line: 1, col: 9, offset: 8 });
    });

    it('rejects an empty extension list', () => {
        const { config, diagnostics } = parseConfig('extensions: []\nignore: []\n', '.sprig.yml');

        expect(config).toEqual({ ignore: [] });
        expect(diagnostics.map(d => [d.code, d.message, d.path])).toEqual([
            ['CONFIG_INVALID_VALUE', '"extensions" must be a non-empty list of extensions; ignoring it.', ['extensions']]
        ]);
    });

    it('applies a named profile over the top-level settings', () => {
        const text = 'format: plain\ncolor: always\nprofiles:\n  ci:\n    format: compact\n';

        const { config, diagnostics } = parseConfig(text, '.sprig.yml', 'ci');

        expect(diagnostics).toEqual([]);
        expect(config).toEqual({ format: 'compact', color: 'always' });
    });

    it('warns when the requested profile does not exist', () => {
        const { config, diagnostics } = parseConfig('format: plain\n', '/work/.sprig.yml', 'nope');

        expect(config).toEqual({ format: 'plain' });
        expect(diagnostics).toEqual([{
            code: 'CONFIG_PROFILE_MISSING',
            message: 'Profile "nope" is not defined in .sprig.yml.',
            severity: 'warning',
            file: '/work/.sprig.yml',
            path: ['profiles', 'nope']
        }]);
    });

    it('reports YAML syntax errors', () => {
        const { config, diagnostics } = parseConfig('format: [json\n', '.sprig.yml');

        expect(config).toEqual({});
        expect(diagnostics.length).toBeGreaterThan(0);
        expect(diagnostics[0].code).toBe('CONFIG_SYNTAX_ERROR');
        expect(diagnostics[0].severity).toBe('error');
    });

    it('rejects a document that is not a mapping', () => {
        const { diagnostics } = parseConfig('- a\n- b\n', '.sprig.yml');

        expect(diagnostics.map(d => d.code)).toEqual(['CONFIG_NOT_A_MAP']);
    });

    it('treats an empty file as no settings', () => {
        expect(parseConfig('', '.sprig.yml')).toEqual({ config: {}, diagnostics: [] });
    });
});

describe('loadConfig', () => {
    it('returns nothing for a missing file', () => {
        expect(loadConfig(path.join(projectDir, 'absent.yml'))).toEqual({ config: {}, diagnostics: [] });
    });

    it('loads a config file with a profile', () => {
        const { config, diagnostics } = loadConfig(path.join(projectDir, '.sprig.yml'), 'ci');

        expect(diagnostics).toEqual([]);
        expect(config).toEqual({ format: 'compact', color: 'never', extensions: ['sprig'] });
    });
});

describe('mergeConfig', () => {
    it('falls back to the defaults', () => {
        expect(mergeConfig({}, {})).toEqual(DEFAULT_CONFIG);
    });

    it('lets flags win over the file and accumulates ignore patterns', () => {
        const merged = mergeConfig(
            { format: 'json', color: 'always', ignore: ['a/**'] },
            { format: undefined, color: 'never', ignore: ['b/**'] }
        );

        expect(merged).toEqual({
            format: 'json',
            color: 'never',
            printAst: false,
            extensions: ['sprig'],
            ignore: ['a/**', 'b/**']
        });
    });
});
