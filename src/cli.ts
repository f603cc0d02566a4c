import { readFileSync } from 'fs';
import { isModuleName, MODULE_NAMES, ModuleResult, RunnerDeps, runModule } from './runner';

export const USAGE = `Usage: monitoring-reconcile <${MODULE_NAMES.join('|')}> <params.json>`;

interface ReportLine {
  changed?: boolean;
  failed?: boolean;
  msg?: string;
}

function toReportLine(result: ModuleResult): ReportLine {
  if (!result.ok) {
    return { failed: true, msg: result.error.message };
  }
  return result.message === undefined
    ? { changed: result.changed }
    : { changed: result.changed, msg: result.message };
}

function readParams(path: string): unknown {
  const raw = readFileSync(path, 'utf-8');
  return raw.trim().length === 0 ? {} : JSON.parse(raw);
}

/**
 * Entry point: `monitoring-reconcile <module> <params.json>`.
 * Writes one JSON line to stdout and resolves to the process exit code.
 */
export async function main(argv: string[], deps: Partial<RunnerDeps> = {}): Promise<number> {
  const [moduleName, paramsPath] = argv;
  if (!moduleName || !paramsPath || !isModuleName(moduleName)) {
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  let params: unknown;
  try {
    params = readParams(paramsPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    process.stdout.write(`${JSON.stringify({ failed: true, msg: `Cannot read ${paramsPath}: ${reason}` })}\n`);
    return 1;
  }

  const result = await runModule(moduleName, params, deps);
  process.stdout.write(`${JSON.stringify(toReportLine(result))}\n`);
  return result.ok ? 0 : 1;
}
