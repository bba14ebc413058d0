/**
 * Locale catalog
 *
 * Reads the language list and per-locale translation catalogs shipped in
 * the locale directory:
 *   locale/language_name_map.json
 *   locale/<locale>/translations.json
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { isRecord } from '../snapshot';
import type { LanguageListEntry, Localization } from '../types';

const LANGUAGE_PREFIX = /^\/(\w+([@-]\w+)?)(\/|$)/;

/**
 * Language code to locale directory name: 'pt-br' -> 'pt_BR', 'zh-hans' -> 'zh_Hans'
 */
export function toLocale(language: string): string {
  const [lang, ...rest] = language.toLowerCase().split('-');
  if (rest.length === 0) {
    return lang;
  }
  const country = rest.join('-');
  const region = country.length > 2 ? country[0].toUpperCase() + country.slice(1) : country.toUpperCase();
  return `${lang}_${region}`;
}

function isLanguageEntry(value: unknown): value is LanguageListEntry {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.code === 'string' &&
    typeof value.locale === 'string'
  );
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

export class LocaleCatalog implements Localization {
  private languages: Promise<LanguageListEntry[]> | null = null;

  constructor(private readonly localeDir: string) {}

  /**
   * Loaded once; a failed load is retried on the next call
   */
  getLanguageList(): Promise<LanguageListEntry[]> {
    if (!this.languages) {
      this.languages = this.loadLanguageList().catch((error: unknown) => {
        this.languages = null;
        throw error;
      });
    }
    return this.languages;
  }

  /**
   * Matches exact codes first, then the generic language ('de-at' -> 'de')
   */
  async getLanguageFromPath(requestPath: string): Promise<string | null> {
    const match = LANGUAGE_PREFIX.exec(requestPath);
    if (!match) {
      return null;
    }

    const requested = match[1].toLowerCase();
    const codes = (await this.getLanguageList()).map((l) => l.code.toLowerCase());
    if (codes.includes(requested)) {
      return requested;
    }
    const generic = requested.split('-')[0];
    return codes.includes(generic) ? generic : null;
  }

  resolveLanguage(pathLanguage: string | null, userDefaultLanguage: string): string {
    return pathLanguage ?? userDefaultLanguage;
  }

  /**
   * English strings are the source strings, so English has no catalog.
   * A missing catalog is logged and treated as empty.
   */
  async getLanguageTranslationData(language: string): Promise<Record<string, string>> {
    if (language === 'en') {
      return {};
    }

    const file = path.join(this.localeDir, toLocale(language), 'translations.json');
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        console.error(`[I18n] Translation file not found: ${file}`);
        return {};
      }
      throw error;
    }

    const data: unknown = JSON.parse(raw);
    if (!isStringMap(data)) {
      throw new Error(`Malformed translation file: ${file}`);
    }
    return data;
  }

  private async loadLanguageList(): Promise<LanguageListEntry[]> {
    const file = path.join(this.localeDir, 'language_name_map.json');
    const data: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
    if (!isRecord(data) || !Array.isArray(data.name_map)) {
      throw new Error(`Malformed language map: ${file}`);
    }
    return data.name_map.filter(isLanguageEntry);
  }
}
