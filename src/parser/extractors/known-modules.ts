import { readFileSync } from 'fs';
import { z } from 'zod';

const knownModulesSchema = z.object({
  cStandardHeaders: z.array(z.string()),
  cppStandardHeaders: z.array(z.string()),
  thirdPartyIncludePrefixes: z.array(z.string()),
  systemIncludePrefixes: z.array(z.string()),
  appleFrameworks: z.array(z.string()),
});

export interface KnownModules {
  cStandardHeaders: ReadonlySet<string>;
  cppStandardHeaders: ReadonlySet<string>;
  thirdPartyIncludePrefixes: readonly string[];
  systemIncludePrefixes: readonly string[];
  appleFrameworks: readonly string[];
}

let cached: KnownModules | null = null;

/** Lookup tables from data/known-modules.json, read once. */
export function getKnownModules(): KnownModules {
  if (cached) return cached;

  // Same relative location from src/parser/extractors and dist/parser/extractors
  const raw = readFileSync(new URL('../../../data/known-modules.json', import.meta.url), 'utf-8');
  const data = knownModulesSchema.parse(JSON.parse(raw));

  cached = {
    cStandardHeaders: new Set(data.cStandardHeaders),
    cppStandardHeaders: new Set(data.cppStandardHeaders),
    thirdPartyIncludePrefixes: data.thirdPartyIncludePrefixes,
    systemIncludePrefixes: data.systemIncludePrefixes,
    appleFrameworks: data.appleFrameworks,
  };
  return cached;
}
