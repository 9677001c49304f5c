import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConfigError } from '../../errors';
import type { ConfigSections, ConfigValue, RcFile } from '../rcfile';
import { loadCoverageConfig, resolveCoverageConfig, toBoolean, toList } from '../coverageConfig';

function rcFile(sections: Record<string, Record<string, ConfigValue>>): RcFile {
  const map: ConfigSections = new Map();
  for (const [name, options] of Object.entries(sections)) map.set(name, new Map(Object.entries(options)));
  return { name: '.coveragerc', path: '/w/.coveragerc', sections: map, ignoredLines: [] };
}

describe('value helpers', () => {
  test('toList splits on commas and newlines', () => {
    expect(toList('a, b\nc,,')).toEqual(['a', 'b', 'c']);
    expect(toList([' x ', ''])).toEqual(['x']);
  });

  test('toBoolean accepts the usual spellings', () => {
    expect(toBoolean('Yes', 'x')).toBe(true);
    expect(toBoolean('off', 'x')).toBe(false);
    expect(toBoolean(true, 'x')).toBe(true);
    expect(() => toBoolean('maybe', 'x')).toThrow("x must be a boolean, got 'maybe'");
  });
});

describe('resolveCoverageConfig', () => {
  test('uses defaults without a config file', () => {
    expect(resolveCoverageConfig({ cwd: '/w', env: {} })).toEqual({
      configFile: undefined,
      dataFile: path.resolve('/w', 'coverage.json'),
      debug: [],
      include: [],
      omit: [],
      ignoreErrors: false,
      showMissing: false,
      precision: 0,
      htmlDirectory: path.resolve('/w', 'htmlcov'),
      htmlTitle: 'Coverage report',
      ignoredLines: [],
    });
  });

  test('reads report, run and json settings from the file', () => {
    const config = resolveCoverageConfig({
      rcFile: rcFile({
        run: { debug: 'sys' },
        report: { omit: 'a/*,b.py', include: ['src/*'], ignore_errors: 'yes', show_missing: true, precision: '2' },
        json: { output: 'out/cov.json' },
      }),
      cwd: '/w',
      env: {},
    });
    expect(config.configFile).toBe('/w/.coveragerc');
    expect(config.dataFile).toBe(path.resolve('/w', 'out/cov.json'));
    expect(config.debug).toEqual(['sys']);
    expect(config.omit).toEqual(['a/*', 'b.py']);
    expect(config.include).toEqual(['src/*']);
    expect(config.ignoreErrors).toBe(true);
    expect(config.showMissing).toBe(true);
    expect(config.precision).toBe(2);
  });

  test('html settings come from [html], the command line directory wins', () => {
    const rc = rcFile({ html: { directory: 'cov_html', title: 'My project' } });
    const fromFile = resolveCoverageConfig({ rcFile: rc, cwd: '/w', env: {} });
    expect(fromFile.htmlDirectory).toBe(path.resolve('/w', 'cov_html'));
    expect(fromFile.htmlTitle).toBe('My project');

    const fromFlag = resolveCoverageConfig({ rcFile: rc, cwd: '/w', env: {}, overrides: { htmlDirectory: 'out' } });
    expect(fromFlag.htmlDirectory).toBe(path.resolve('/w', 'out'));
  });

  test('command line values win, debug options add up', () => {
    const config = resolveCoverageConfig({
      rcFile: rcFile({ run: { debug: 'sys' }, report: { omit: 'a/*' } }),
      cwd: '/w',
      env: { COVERAGE_DEBUG: 'dataio, sys' },
      overrides: { omit: ['x/*'], debug: ['config'] },
    });
    expect(config.omit).toEqual(['x/*']);
    expect(config.debug).toEqual(['sys', 'dataio', 'config']);
  });

  test('rejects bad values with the file and option in the message', () => {
    expect(() => resolveCoverageConfig({ rcFile: rcFile({ report: { ignore_errors: 'maybe' } }), cwd: '/w', env: {} })).toThrow(
      "[report] ignore_errors in .coveragerc must be a boolean, got 'maybe'",
    );
    expect(() => resolveCoverageConfig({ rcFile: rcFile({ report: { precision: 'two' } }), cwd: '/w', env: {} })).toThrow(
      ConfigError,
    );
    expect(() => resolveCoverageConfig({ rcFile: rcFile({ report: { precision: 11 } }), cwd: '/w', env: {} })).toThrow(
      '[report] precision must be between 0 and 10, got 11',
    );
  });
});

describe('loadCoverageConfig', () => {
  test('finds the file in cwd and applies it', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cov-cfg-'));
    fs.writeFileSync(path.join(dir, 'setup.cfg'), '[coverage:report]\nomit =\n    */tests/*\n    setup.py\n', 'utf8');
    const config = await loadCoverageConfig({ cwd: dir, env: {} });
    expect(config.configFile).toBe(path.join(dir, 'setup.cfg'));
    expect(config.omit).toEqual(['*/tests/*', 'setup.py']);
  });

  test('keeps the lines the file could not use', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cov-cfg-'));
    fs.writeFileSync(path.join(dir, '.coveragerc'), '[report]\nomit: a.py\nprecision = 1\n', 'utf8');
    const config = await loadCoverageConfig({ cwd: dir, env: {} });
    expect(config.omit).toEqual([]);
    expect(config.ignoredLines).toEqual(['.coveragerc:2: omit: a.py']);
  });
});
