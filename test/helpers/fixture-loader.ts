import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const FIXTURES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function loadFixture(group: string, filename: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, group, filename), 'utf-8');
}
