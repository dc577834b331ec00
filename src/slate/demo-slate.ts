import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { GameListing } from '../types/match.js';
import { findPackageRoot } from '../utils/paths.js';
import { gameListingSchema } from '../validation/schemas.js';

export function demoSlatePath(startDir?: string): string {
  return path.join(findPackageRoot(startDir), 'data', 'demo-games.json');
}

/** Sample fixtures for trying the service without a live odds feed. */
export function loadDemoSlate(file: string = demoSlatePath()): GameListing[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  return z.array(gameListingSchema).parse(raw);
}
