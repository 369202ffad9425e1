import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, defaultWorkspaceRoot, resolveBundledAliasesPath } from '../src/workspace/paths.js';
import { loadAliasTable, resolveWorkspaceRoot, resolveCleanupAgeMinutes } from '../src/workspace/config.js';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

afterEach(() => {
    vi.restoreAllMocks();
});

describe('Workspace Detection', () => {
    it('should detect workspace root when party-aliases.yaml exists', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/work/gst/2026-03');
        vi.mocked(fs.existsSync).mockImplementation((p) => String(p) === '/work/config/party-aliases.yaml');

        expect(detectWorkspaceRoot()).toBe('/work');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(detectWorkspaceRoot('/work/gst')).toBeNull();
    });
});

describe('Path Resolution', () => {
    it('should prefer a workspace-local alias table', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);

        const workspace = resolveWorkspace('/work');

        expect(workspace.root).toBe('/work');
        expect(workspace.config.aliasesPath).toBe(path.join('/work', 'config', 'party-aliases.yaml'));
    });

    it('should fall back to the bundled alias table', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(resolveWorkspace('/work').config.aliasesPath).toBe(resolveBundledAliasesPath());
        expect(resolveBundledAliasesPath().endsWith(path.join('cli', 'assets', 'party-aliases.yaml'))).toBe(true);
    });

    it('should keep default outputs in the temp directory', () => {
        expect(defaultWorkspaceRoot()).toBe(path.join(tmpdir(), 'excel_summarizer_uploads'));
    });
});

describe('Workspace Root Resolution', () => {
    it('should prefer the explicit flag, then the environment', () => {
        const env = { GSTSUM_WORKSPACE: '/env/outputs' };

        expect(resolveWorkspaceRoot('/flag/outputs', env)).toBe('/flag/outputs');
        expect(resolveWorkspaceRoot(undefined, env)).toBe('/env/outputs');
    });

    it('should fall back to the temp directory when nothing is configured', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/somewhere');
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(resolveWorkspaceRoot(undefined, {})).toBe(defaultWorkspaceRoot());
    });
});

describe('Cleanup Age', () => {
    it('should default to 60 minutes', () => {
        expect(resolveCleanupAgeMinutes(undefined, {})).toBe(60);
        expect(resolveCleanupAgeMinutes(undefined, { GSTSUM_CLEANUP_AGE_MIN: '' })).toBe(60);
    });

    it('should read the flag before the environment', () => {
        const env = { GSTSUM_CLEANUP_AGE_MIN: '30' };

        expect(resolveCleanupAgeMinutes('5', env)).toBe(5);
        expect(resolveCleanupAgeMinutes(undefined, env)).toBe(30);
        expect(resolveCleanupAgeMinutes('0', env)).toBe(0);
    });

    it('should reject values that are not minutes', () => {
        expect(() => resolveCleanupAgeMinutes('soon', {})).toThrow(
            'Invalid cleanup age "soon". Use a number of minutes (e.g. 60).'
        );
        expect(() => resolveCleanupAgeMinutes('-1', {})).toThrow('Invalid cleanup age "-1"');
    });
});

describe('Alias Table Loading', () => {
    it('should load the aliases mapping form', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue(
            'aliases:\n  - alias: "ASIAN PAINTS"\n    short: "ASIAN"\n  - alias: "SIMPSON & CO"\n    short: "SIMPSON"\n'
        );

        expect(loadAliasTable('/work/config/party-aliases.yaml')).toEqual([
            { alias: 'ASIAN PAINTS', short: 'ASIAN' },
            { alias: 'SIMPSON & CO', short: 'SIMPSON' },
        ]);
    });

    it('should load a bare list', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('- alias: JOTHI TRADERS\n  short: Jothi\n');

        expect(loadAliasTable('/work/aliases.yaml')).toEqual([{ alias: 'JOTHI TRADERS', short: 'Jothi' }]);
    });

    it('should read an empty file as an empty table', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('');

        expect(loadAliasTable('/work/aliases.yaml')).toEqual([]);
    });

    it('should reject entries without a short name', () => {
        vi.mocked(fs.existsSync).mockReturnValue(true);
        vi.mocked(fs.readFileSync).mockReturnValue('aliases:\n  - alias: ASIAN PAINTS\n');

        expect(() => loadAliasTable('/work/aliases.yaml')).toThrow();
    });

    it('should fail when the file does not exist', () => {
        vi.mocked(fs.existsSync).mockReturnValue(false);

        expect(() => loadAliasTable('/missing.yaml')).toThrow('Alias file not found: /missing.yaml');
    });
});
