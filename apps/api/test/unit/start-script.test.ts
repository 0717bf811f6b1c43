import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const rootDir = fileURLToPath(new URL('../../../../', import.meta.url));

interface RootManifest {
  scripts: Record<string, string>;
  devDependencies: Record<string, string>;
}

function readRootManifest(): RootManifest {
  return JSON.parse(readFileSync(`${rootDir}package.json`, 'utf8'));
}

describe('start script', () => {
  it('runs the TypeScript server entry through tsx', () => {
    const manifest = readRootManifest();

    expect(manifest.scripts.start).toBe('tsx apps/api/src/server.ts');
    expect(manifest.devDependencies).toHaveProperty('tsx');
  });

  it('points at an entry file that exists', () => {
    const [, entry] = readRootManifest().scripts.start.split(' ');

    expect(existsSync(`${rootDir}${entry}`)).toBe(true);
  });
});
