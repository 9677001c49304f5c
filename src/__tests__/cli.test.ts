import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, runAnnotate } from '../cli';
import { bufferedIo } from '../cli/io';
import { formatCommandHelp } from '../cli/help';
import { ANNOTATE_COMMAND, HTML_COMMAND, REPORT_COMMAND } from '../cli/options';
import { NoSourceError } from '../errors';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function mkProject(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cov-cli-'));
  writeFile(path.join(dir, 'mod.py'), 'a = 1\nif a:\n    b = 2\n');
  writeFile(path.join(dir, 'pkg', 'util.py'), 'def f():\n    return 1\n');
  writeFile(
    path.join(dir, 'coverage.json'),
    JSON.stringify({
      meta: { version: '7.4.0' },
      files: {
        'mod.py': { executed_lines: [1, 2], missing_lines: [3] },
        'pkg/util.py': { executed_lines: [1, 2], missing_lines: [] },
      },
    }),
  );
  return dir;
}

async function run(args: string[], opts: { cwd?: string; env?: NodeJS.ProcessEnv } = {}) {
  const io = bufferedIo({ cwd: opts.cwd ?? os.tmpdir(), env: opts.env ?? {} });
  const code = await main(['node', 'coverage', ...args], io);
  return { code, out: io.out.join(''), err: io.err.join('') };
}

describe('coverage command line', () => {
  test('with no arguments prints a short hint', async () => {
    const r = await run([]);
    expect(r).toEqual({ code: 0, out: "Code coverage for Python.  Use 'coverage help' for help.\n", err: '' });
  });

  test('annotate --help and -h print the command help', async () => {
    for (const flag of ['--help', '-h']) {
      const r = await run(['annotate', flag]);
      expect(r.code).toBe(0);
      expect(r.out).toBe(formatCommandHelp(ANNOTATE_COMMAND));
    }
  });

  test('help <command> prints that command help', async () => {
    const r = await run(['help', 'report']);
    expect(r.code).toBe(0);
    expect(r.out).toBe(formatCommandHelp(REPORT_COMMAND));
  });

  test('html --help prints the html command help', async () => {
    const r = await run(['html', '--help']);
    expect(r.code).toBe(0);
    expect(r.out).toBe(formatCommandHelp(HTML_COMMAND));
  });

  test('help lists the commands', async () => {
    const r = await run(['help']);
    expect(r.code).toBe(0);
    expect(r.out).toContain('    annotate    Annotate source files with execution information.\n');
    expect(r.out).toContain('    html        Create an HTML report.\n');
  });

  test('unknown commands and options fail with status 1', async () => {
    const bad = await run(['xyzzy']);
    expect(bad.code).toBe(1);
    expect(bad.err).toBe("Unknown command: 'xyzzy'\nCode coverage for Python.  Use 'coverage help' for help.\n");

    const opt = await run(['annotate', '-z']);
    expect(opt.code).toBe(1);
    expect(opt.err).toContain("unknown option '-z'");
  });

  test('without data there is nothing to annotate', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cov-empty-'));
    const r = await run(['annotate'], { cwd: dir });
    expect(r).toEqual({ code: 1, out: '', err: 'No data to report.\n' });
  });

  test('annotate writes beside the sources', async () => {
    const dir = mkProject();
    const r = await run(['annotate'], { cwd: dir });
    expect(r).toEqual({ code: 0, out: '', err: '' });
    expect(fs.readFileSync(path.join(dir, 'mod.py,cover'), 'utf8')).toBe('> a = 1\n> if a:\n!     b = 2\n');
    expect(fs.readFileSync(path.join(dir, 'pkg', 'util.py,cover'), 'utf8')).toBe('> def f():\n>     return 1\n');
  });

  test('annotate -d writes flattened names into the directory', async () => {
    const dir = mkProject();
    const r = await run(['annotate', '-d', 'out', '--omit=mod.py'], { cwd: dir });
    expect(r.code).toBe(0);
    expect(fs.readdirSync(path.join(dir, 'out'))).toEqual(['pkg_util.py,cover']);
  });

  test('annotate restricts to named modules', async () => {
    const dir = mkProject();
    await run(['annotate', 'pkg/util.py'], { cwd: dir });
    expect(fs.existsSync(path.join(dir, 'pkg', 'util.py,cover'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'mod.py,cover'))).toBe(false);
  });

  test('a missing source fails unless -i is given', async () => {
    const dir = mkProject();
    fs.rmSync(path.join(dir, 'mod.py'));

    const failed = await run(['annotate'], { cwd: dir });
    expect(failed.code).toBe(1);
    expect(failed.err).toBe(`No source for code: '${path.join(dir, 'mod.py')}'.\n`);

    const ignored = await run(['annotate', '-i'], { cwd: dir });
    expect(ignored.code).toBe(0);
    expect(fs.existsSync(path.join(dir, 'pkg', 'util.py,cover'))).toBe(true);
  });

  test('--debug and COVERAGE_DEBUG both enable debug output', async () => {
    const dir = mkProject();
    const dataFile = path.join(dir, 'coverage.json');

    const viaFlag = await run(['annotate', '--debug=dataio'], { cwd: dir });
    expect(viaFlag.err.split('\n')[0]).toBe(`dataio: Reading data from '${dataFile}'`);

    const viaEnv = await run(['annotate'], { cwd: dir, env: { COVERAGE_DEBUG: 'dataio' } });
    expect(viaEnv.err.split('\n')[0]).toBe(`dataio: Reading data from '${dataFile}'`);
  });

  test('--rcfile and COVERAGE_RCFILE choose the config file', async () => {
    const dir = mkProject();
    fs.renameSync(path.join(dir, 'coverage.json'), path.join(dir, 'data.json'));
    writeFile(path.join(dir, 'ci.cfg'), '[json]\noutput = data.json\n\n[report]\nomit = pkg/*\n');

    const viaFlag = await run(['annotate', '--rcfile=ci.cfg'], { cwd: dir });
    expect(viaFlag.code).toBe(0);
    expect(fs.existsSync(path.join(dir, 'mod.py,cover'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'pkg', 'util.py,cover'))).toBe(false);

    const viaEnv = await run(['annotate'], { cwd: dir, env: { COVERAGE_RCFILE: 'ci.cfg' } });
    expect(viaEnv.code).toBe(0);

    const missing = await run(['annotate', '--rcfile=none.cfg'], { cwd: dir });
    expect(missing).toEqual({ code: 1, out: '', err: "Couldn't read 'none.cfg' as a config file\n" });
  });

  test('html writes an index and a page per file into htmlcov', async () => {
    const dir = mkProject();
    const r = await run(['html'], { cwd: dir });
    expect(r).toEqual({ code: 0, out: '', err: '' });
    expect(fs.readdirSync(path.join(dir, 'htmlcov')).sort()).toEqual(['index.html', 'mod_py.html', 'pkg_util_py.html']);
    const page = fs.readFileSync(path.join(dir, 'htmlcov', 'mod_py.html'), 'utf8').split('\n');
    expect(page).toContain('<p class="mis" id="t3"><span class="n"><a href="#t3">3</a></span><span class="t">    b = 2</span></p>');
  });

  test('html -d and --title, restricted to named modules', async () => {
    const dir = mkProject();
    const r = await run(['html', '-d', 'site', '--title=Nightly', 'mod.py'], { cwd: dir });
    expect(r.code).toBe(0);
    expect(fs.readdirSync(path.join(dir, 'site')).sort()).toEqual(['index.html', 'mod_py.html']);
    expect(fs.readFileSync(path.join(dir, 'site', 'index.html'), 'utf8').split('\n')).toContain('<h1>Nightly: 67%</h1>');
  });

  test('report prints the summary table', async () => {
    const dir = mkProject();
    const r = await run(['report', '-m'], { cwd: dir });
    expect(r.code).toBe(0);
    expect(r.out).toBe(
      [
        'Name          Stmts   Miss  Cover   Missing',
        '-------------------------------------------',
        'mod.py            3      1    67%   3',
        'pkg/util.py       2      0   100%',
        '-------------------------------------------',
        'TOTAL             5      1    80%',
        '',
      ].join('\n'),
    );
  });

  test('report --format=markdown', async () => {
    const dir = mkProject();
    const r = await run(['report', '--format=markdown', 'mod.py'], { cwd: dir });
    expect(r.out).toBe(['| Name | Stmts | Miss | Cover |', '|---|---:|---:|---:|', '| mod.py | 3 | 1 | 67% |', ''].join('\n'));
  });
});

describe('runAnnotate', () => {
  test('raises source errors to the caller', async () => {
    const dir = mkProject();
    fs.rmSync(path.join(dir, 'pkg', 'util.py'));
    await expect(runAnnotate({ modules: [], io: bufferedIo({ cwd: dir }) })).rejects.toThrow(NoSourceError);
  });
});
