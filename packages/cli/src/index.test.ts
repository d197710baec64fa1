import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';

import { ErrorCode, getExitCode, type RouteDefinition } from '@routeforge/core';
import { main } from './index.js';
import { stripAnsi } from './render.js';

const productRoute: RouteDefinition = {
  rawText: 'products/{id}',
  segments: [[{ literal: 'products' }], [{ parameter: 'id' }]],
  defaults: { id: '1' },
};

const apiGroup: RouteDefinition = {
  rawText: 'api/{version}',
  segments: [[{ literal: 'api' }], [{ parameter: 'version' }]],
};

async function createFixtures(
  files: Record<string, RouteDefinition>
): Promise<{ dir: string; paths: Record<string, string> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'routeforge-cli-'));
  const paths: Record<string, string> = {};
  for (const [name, definition] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    await writeFile(filePath, JSON.stringify(definition), 'utf8');
    paths[name] = filePath;
  }
  return { dir, paths };
}

function captureOutput(): { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation(
    (chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    }
  );
  vi.spyOn(process.stderr, 'write').mockImplementation(
    (chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    }
  );
  return { stdout, stderr };
}

function captureExit(): { errors: string[] } {
  vi.spyOn(process, 'exit').mockImplementation(
    (code?: string | number | null) => {
      throw new Error(`EXIT:${code ?? 0}`);
    }
  );
  const errors: string[] = [];
  vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
    errors.push(stripAnsi(String(message)));
  });
  return { errors };
}

const dirs: string[] = [];

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(
    dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true }))
  );
});

describe('routeforge compile', () => {
  it('prints the pattern summary as JSON', async () => {
    const { dir, paths } = await createFixtures({ 'route.json': productRoute });
    dirs.push(dir);
    const { stdout } = captureOutput();

    await main(['node', 'routeforge', 'compile', paths['route.json']]);

    expect(JSON.parse(stdout.join(''))).toEqual({
      rawText: 'products/{id}',
      template: 'products/{id=1}',
      parameters: [
        {
          name: 'id',
          kind: 'standard',
          default: '1',
          policies: [],
          encodeSlashes: true,
        },
      ],
      defaults: { id: '1' },
      parameterPolicies: {},
      requiredValues: {},
      segmentCount: 2,
    });
  });

  it('prints the canonical template with --out template', async () => {
    const { dir, paths } = await createFixtures({ 'route.json': productRoute });
    dirs.push(dir);
    const { stdout } = captureOutput();

    await main([
      'node',
      'routeforge',
      'compile',
      paths['route.json'],
      '--out',
      'TEMPLATE',
    ]);

    expect(stdout.join('')).toBe('products/{id=1}\n');
  });

  it('writes configuration and merge notes to stderr with --debug-passes', async () => {
    const { dir, paths } = await createFixtures({ 'route.json': productRoute });
    dirs.push(dir);
    const { stderr } = captureOutput();

    await main([
      'node',
      'routeforge',
      'compile',
      paths['route.json'],
      '--debug-passes',
    ]);

    expect(stderr).toEqual([
      '[routeforge] effective config: {"valueComparer":"default","collectNotes":true}\n',
      '[routeforge] notes(route.json): 1\n',
      '[routeforge] DEFAULT_APPLIED id {"value":"1"}\n',
    ]);
  });

  it('collects no notes with --no-notes', async () => {
    const { dir, paths } = await createFixtures({ 'route.json': productRoute });
    dirs.push(dir);
    const { stderr } = captureOutput();

    await main([
      'node',
      'routeforge',
      'compile',
      paths['route.json'],
      '--debug-passes',
      '--no-notes',
    ]);

    expect(stderr).toEqual([
      '[routeforge] effective config: {"valueComparer":"default","collectNotes":false}\n',
      '[routeforge] notes(route.json): 0\n',
    ]);
  });

  it('exits with the definition error code when the file is missing', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'routeforge-cli-'));
    dirs.push(dir);
    const missing = path.join(dir, 'missing.json');
    captureOutput();
    const { errors } = captureExit();

    await expect(
      main(['node', 'routeforge', 'compile', missing])
    ).rejects.toThrow(`EXIT:${getExitCode(ErrorCode.INVALID_DEFINITION)}`);

    expect(errors).toHaveLength(1);
    expect(errors[0]?.split('\n')[0]).toBe(
      `✖ Error E301: Definition file not found: ${missing}`
    );
  });

  it('exits with the configuration error code for an unknown --out value', async () => {
    const { dir, paths } = await createFixtures({ 'route.json': productRoute });
    dirs.push(dir);
    captureOutput();
    const { errors } = captureExit();

    await expect(
      main(['node', 'routeforge', 'compile', paths['route.json'], '--out', 'yaml'])
    ).rejects.toThrow(`EXIT:${getExitCode(ErrorCode.CONFIGURATION_ERROR)}`);

    expect(errors[0]?.split('\n')[0]).toBe(
      "✖ Error E300: Invalid --out value 'yaml'. Expected json|template."
    );
  });

  it('reports schema violations in the definition document', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'routeforge-cli-'));
    dirs.push(dir);
    const filePath = path.join(dir, 'broken.json');
    await writeFile(filePath, JSON.stringify({ rawText: 'x' }), 'utf8');
    captureOutput();
    const { errors } = captureExit();

    await expect(
      main(['node', 'routeforge', 'compile', filePath])
    ).rejects.toThrow(`EXIT:${getExitCode(ErrorCode.INVALID_DEFINITION)}`);

    expect(errors[0]?.split('\n')[0]).toBe(
      "✖ Error E301: Invalid route definition: definition must have required property 'segments'"
    );
  });
});

describe('routeforge combine', () => {
  it('prints the combined template, group first', async () => {
    const { dir, paths } = await createFixtures({
      'group.json': apiGroup,
      'route.json': productRoute,
    });
    dirs.push(dir);
    const { stdout } = captureOutput();

    await main([
      'node',
      'routeforge',
      'combine',
      paths['group.json'],
      paths['route.json'],
      '--out',
      'template',
    ]);

    expect(stdout.join('')).toBe('api/{version}/products/{id=1}\n');
  });

  it('exits with the conflict code when both sides default a key differently', async () => {
    const { dir, paths } = await createFixtures({
      'group.json': {
        rawText: '{lang}',
        segments: [[{ parameter: 'lang' }]],
        defaults: { lang: 'en' },
      },
      'route.json': {
        rawText: 'home',
        segments: [[{ literal: 'home' }]],
        defaults: { lang: 'fr' },
      },
    });
    dirs.push(dir);
    captureOutput();
    const { errors } = captureExit();

    await expect(
      main(['node', 'routeforge', 'combine', paths['group.json'], paths['route.json']])
    ).rejects.toThrow(`EXIT:${getExitCode(ErrorCode.DICTIONARY_CONFLICT)}`);

    const lines = errors[0]?.split('\n') ?? [];
    expect(lines[0]).toBe(
      "✖ Error E200: The route pattern '{lang}/home' has a conflicting value for the key 'lang' in the 'defaults' dictionary: 'en' and 'fr'."
    );
    expect(lines).toContain('Key: lang');
  });
});
