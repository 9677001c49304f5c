import type { CoverageConfig } from '../config/coverageConfig';
import { stableStringify } from '../util/deterministicJson';
import type { DebugControl } from './debugControl';

/** Emit the `sys` and `config` debug sections, when enabled. */
export function writeDebugInfo(debug: DebugControl, config: CoverageConfig, info: { version: string; cwd: string }): void {
  if (debug.should('sys')) {
    const rows: Array<[string, string]> = [
      ['version', info.version],
      ['node', process.version],
      ['platform', process.platform],
      ['cwd', info.cwd],
      ['config_file', config.configFile ?? '-none-'],
      ['data_file', config.dataFile],
      ['debug', debug.enabled.join(', ') || '-none-'],
    ];
    const width = Math.max(...rows.map(([k]) => k.length));
    debug.write('sys', rows.map(([k, v]) => `${k.padStart(width)}: ${v}`).join('\n'));
  }
  if (debug.should('config')) {
    for (const line of config.ignoredLines) debug.write('config', `Ignored config line, expected 'name = value': ${line}`);
    debug.write('config', stableStringify(config));
  }
}
