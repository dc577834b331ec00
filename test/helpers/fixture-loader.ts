import fs from 'node:fs';
import path from 'node:path';

const FIXTURES_DIR = path.resolve(
  new URL('.', import.meta.url).pathname,
  '..',
  'fixtures',
);

export function loadFixture(group: string, filename: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, group, filename), 'utf-8');
}

export function loadJsonFixture(group: string, filename: string): unknown {
  return JSON.parse(loadFixture(group, filename));
}
