/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the fixtures directory
 * Works whether running from src or dist
 */
function getFixturesRoot(): string {
  // Compiled code lives in dist/fixtures; the .pgn files stay in src
  if (__dirname.includes(`${path.sep}dist${path.sep}`)) {
    const packageRoot = path.resolve(__dirname, '..', '..');
    return path.join(packageRoot, 'src', 'fixtures', 'games');
  }

  return path.join(__dirname, 'games');
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Load a PGN fixture file synchronously
 */
export function loadPgnSync(relativePath: string): string {
  const fullPath = getFixturePath(relativePath);
  return fs.readFileSync(fullPath, 'utf-8');
}

/**
 * List all PGN fixtures in a directory
 */
export function listPgnFixtures(directory: string): string[] {
  const fullPath = getFixturePath(directory);
  if (!fs.existsSync(fullPath)) {
    return [];
  }
  return fs
    .readdirSync(fullPath)
    .filter((f) => f.endsWith('.pgn'))
    .map((f) => path.join(directory, f));
}
