import * as fs from 'fs';
import * as path from 'path';
import { defaultSettings, loadSettings, mergeSettings, parseSettingsDocument, settingsFromEnv } from '../src/settings';
import { SettingsError } from '../src/errors';

describe('settings', () => {
  const tmp = path.join(__dirname, 'tmp-settings');
  const file = path.join(tmp, 'binscope.yml');
  const broken = path.join(tmp, 'broken.yml');

  beforeAll(() => {
    fs.mkdirSync(tmp, { recursive: true });
    fs.writeFileSync(file, [
      'language: c',
      'commands:',
      '  objdump: arm-none-eabi-objdump',
      '  nm: arm-none-eabi-nm',
      'toolTimeoutMs: 15000',
      'exclusionPattern: "__"',
      'unrelated: ignored'
    ].join('\n'));
    fs.writeFileSync(broken, 'language: [unterminated');
  });
  afterAll(() => { try { fs.rmSync(tmp, { recursive: true, force: true }); } catch {} });

  it('provides plain binutils names by default', () => {
    const s = defaultSettings();
    expect(s.language).toBe('cpp');
    expect(s.commands).toEqual({ objdump: 'objdump', nm: 'nm', readelf: 'readelf', size: 'size' });
    expect(s.strictTools).toBe(false);
  });

  it('layers file, environment and overrides over the defaults', async () => {
    const s = await loadSettings({
      file,
      env: { BINSCOPE_NM: 'llvm-nm', BINSCOPE_STRICT_TOOLS: 'yes' },
      overrides: { verbose: true, commands: { size: 'arm-none-eabi-size' } }
    });
    expect(s.language).toBe('c');
    expect(s.commands).toEqual({
      objdump: 'arm-none-eabi-objdump',
      nm: 'llvm-nm',
      readelf: 'readelf',
      size: 'arm-none-eabi-size'
    });
    expect(s.toolTimeoutMs).toBe(15000);
    expect(s.exclusionPattern).toBe('__');
    expect(s.strictTools).toBe(true);
    expect(s.verbose).toBe(true);
  });

  it('does not let undefined override values erase earlier layers', () => {
    const s = mergeSettings(defaultSettings(), { language: 'c' }, { language: undefined, commands: { nm: undefined } });
    expect(s.language).toBe('c');
    expect(s.commands.nm).toBe('nm');
  });

  it('reads tool settings from the environment', () => {
    expect(settingsFromEnv({ BINSCOPE_LANGUAGE: 'c', BINSCOPE_READELF: 'llvm-readelf', BINSCOPE_TOOL_TIMEOUT_MS: '2500' }))
      .toEqual({ language: 'c', commands: { readelf: 'llvm-readelf' }, toolTimeoutMs: 2500 });
    expect(settingsFromEnv({ BINSCOPE_TOOL_TIMEOUT_MS: 'soon' })).toEqual({});
    expect(() => settingsFromEnv({ BINSCOPE_LANGUAGE: 'rust' })).toThrow(SettingsError);
  });

  it('defaults to no tool time limit and accepts 0 to disable one', () => {
    expect(defaultSettings().toolTimeoutMs).toBe(0);
    expect(parseSettingsDocument({ toolTimeoutMs: 0 })).toEqual({ toolTimeoutMs: 0 });
    expect(() => parseSettingsDocument({ toolTimeoutMs: -1 }))
      .toThrow("settings: 'toolTimeoutMs' must be a non-negative number (0 disables the limit)");
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseSettingsDocument({ language: 'fortran' })).toThrow(SettingsError);
    expect(() => parseSettingsDocument({ commands: { nm: 3 } })).toThrow("settings: 'commands.nm' must be a non-empty string");
    expect(() => parseSettingsDocument({ strictTools: 'yes' })).toThrow(SettingsError);
    expect(() => parseSettingsDocument(['objdump'])).toThrow(SettingsError);
    expect(parseSettingsDocument(null)).toEqual({});
  });

  it('reports unreadable settings files', async () => {
    await expect(loadSettings({ file: path.join(tmp, 'absent.yml'), env: {} })).rejects.toThrow(SettingsError);
    await expect(loadSettings({ file: broken, env: {} })).rejects.toThrow(SettingsError);
  });
});
