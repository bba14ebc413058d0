import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadServerSettings } from '../config';
import { LocaleCatalog, toLocale } from './locale-catalog';

const catalog = () => new LocaleCatalog(loadServerSettings({}).localeDir);

describe('toLocale', () => {
  it('should map language codes to locale directories', () => {
    expect(toLocale('de')).toBe('de');
    expect(toLocale('pt-br')).toBe('pt_BR');
    expect(toLocale('zh-hans')).toBe('zh_Hans');
  });
});

describe('LocaleCatalog', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should read the language list', async () => {
    const languages = await catalog().getLanguageList();

    expect(languages.map((l) => l.code)).toEqual(['de', 'en', 'fr', 'pt-br']);
    expect(languages[0]).toEqual({ name: 'Deutsch', code: 'de', locale: 'de', percent_translated: 92 });
  });

  it('should retry the language list after a failed load', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'homeview-locale-'));
    try {
      const i18n = new LocaleCatalog(dir);
      await expect(i18n.getLanguageList()).rejects.toThrow();

      await fs.writeFile(
        path.join(dir, 'language_name_map.json'),
        JSON.stringify({ name_map: [{ name: 'English', code: 'en', locale: 'en' }] })
      );

      expect(await i18n.getLanguageList()).toEqual([{ name: 'English', code: 'en', locale: 'en' }]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should find supported languages in the path', async () => {
    const i18n = catalog();

    expect(await i18n.getLanguageFromPath('/de/')).toBe('de');
    expect(await i18n.getLanguageFromPath('/pt-BR')).toBe('pt-br');
    expect(await i18n.getLanguageFromPath('/fr-ca/#narrow')).toBe('fr');
    expect(await i18n.getLanguageFromPath('/xx/')).toBeNull();
    expect(await i18n.getLanguageFromPath('/')).toBeNull();
  });

  it('should let the path language win', () => {
    const i18n = catalog();

    expect(i18n.resolveLanguage('de', 'fr')).toBe('de');
    expect(i18n.resolveLanguage(null, 'fr')).toBe('fr');
  });

  it('should load translations', async () => {
    const data = await catalog().getLanguageTranslationData('de');

    expect(data.Settings).toBe('Einstellungen');
  });

  it('should have no catalog for English', async () => {
    expect(await catalog().getLanguageTranslationData('en')).toEqual({});
  });

  it('should log and return nothing for a missing catalog', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await catalog().getLanguageTranslationData('pt-br')).toEqual({});
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('pt_BR/translations.json');
  });
});
