import { extname } from 'path';
import type { LanguageTag } from '../../types.js';
import { cExtractor } from './c.js';
import { cppExtractor } from './cpp.js';
import { objcExtractor } from './objc.js';
import { objcppExtractor } from './objcpp.js';
import { goExtractor } from './go.js';
import { pythonExtractor } from './python.js';
import { javaExtractor } from './java.js';
import { kotlinExtractor } from './kotlin.js';
import { swiftExtractor } from './swift.js';
import type { LanguageExtractor } from './types.js';

const extractors: LanguageExtractor[] = [
  cExtractor,
  cppExtractor,
  objcExtractor,
  objcppExtractor,
  goExtractor,
  pythonExtractor,
  javaExtractor,
  kotlinExtractor,
  swiftExtractor,
];

const languageMap = new Map<LanguageTag, LanguageExtractor>();
const extensionMap = new Map<string, LanguageExtractor>();
for (const extractor of extractors) {
  languageMap.set(extractor.language, extractor);
  for (const ext of extractor.extensions) {
    extensionMap.set(ext, extractor);
  }
}

/** Lookup used by the batch pool; injectable so tests can stand in their own extractors. */
export interface ExtractorRegistry {
  getExtractor(language: LanguageTag): LanguageExtractor | undefined;
}

export const defaultRegistry: ExtractorRegistry = { getExtractor };

export function getExtractor(language: LanguageTag): LanguageExtractor | undefined {
  return languageMap.get(language);
}

export function getExtractorForFile(filePath: string): LanguageExtractor | undefined {
  return extensionMap.get(extname(filePath).toLowerCase());
}

/** Language implied by the extension alone; `.h` is always C here. */
export function detectLanguage(filePath: string): LanguageTag | undefined {
  return getExtractorForFile(filePath)?.language;
}

export function getSupportedExtensions(): string[] {
  return Array.from(extensionMap.keys());
}

export function getRegisteredLanguages(): LanguageTag[] {
  return extractors.map(e => e.language);
}

export function isLanguageTag(value: string): value is LanguageTag {
  return extractors.some(e => e.language === value);
}

export { cExtractor } from './c.js';
export { cppExtractor } from './cpp.js';
export { objcExtractor } from './objc.js';
export { objcppExtractor } from './objcpp.js';
export { goExtractor } from './go.js';
export { pythonExtractor } from './python.js';
export { javaExtractor } from './java.js';
export { kotlinExtractor } from './kotlin.js';
export { swiftExtractor } from './swift.js';
export type { LanguageExtractor, ExtractionOutcome, ExtractionContext } from './types.js';
