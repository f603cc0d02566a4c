import { config as defaultConfig, ReconcilerConfig } from './config';
import { ErrorKind, ReconcileError, ValidationError } from './errors';
import { HostGroupReconciler } from './services/hostGroupReconciler';
import { HostReconciler } from './services/hostReconciler';
import { MonitoringApi } from './services/monitoringApi';
import { RpcClient, RpcClientOptions, RpcSession } from './services/rpcClient';
import { TemplateReconciler } from './services/templateReconciler';
import type { ReconcileOutcome } from './types';
import { logger } from './utils/logger';
import {
  hostGroupParamsSchema,
  hostParamsSchema,
  parseModuleParams,
  templateParamsSchema,
} from './validators/moduleParams';

export const MODULE_NAMES = ['host', 'hostgroup', 'template'] as const;
export type ModuleName = (typeof MODULE_NAMES)[number];

export type ModuleResult =
  | { ok: true; changed: boolean; message?: string }
  | { ok: false; changed: false; error: { kind: ErrorKind | 'internal'; message: string } };

export interface RunnerDeps {
  config: ReconcilerConfig;
  createSession: (options: RpcClientOptions) => RpcSession;
}

interface LoginParams {
  login_user?: string;
  login_password?: string;
  login_url?: string;
}

export function isModuleName(value: string): value is ModuleName {
  return MODULE_NAMES.some((name) => name === value);
}

async function openSession(params: LoginParams, deps: RunnerDeps): Promise<RpcSession> {
  const url = params.login_url || deps.config.monitoring.url;
  if (!url) {
    throw new ValidationError('login_url is required (or set MONITORING_URL)');
  }

  const session = deps.createSession({
    url,
    timeoutMs: deps.config.rpc.timeoutMs,
    legacyAuth: deps.config.rpc.legacyAuth,
  });
  await session.login(
    params.login_user || deps.config.monitoring.user,
    params.login_password ?? deps.config.monitoring.password
  );
  return session;
}

async function closeSession(session: RpcSession): Promise<void> {
  try {
    await session.logout();
  } catch (error) {
    // The reconcile already happened; a stale session is not worth failing the run
    logger.warn('Failed to log out of monitoring server', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

async function withSession(
  params: LoginParams,
  deps: RunnerDeps,
  work: (api: MonitoringApi) => Promise<ReconcileOutcome>
): Promise<ReconcileOutcome> {
  const session = await openSession(params, deps);
  try {
    return await work(new MonitoringApi(session));
  } finally {
    await closeSession(session);
  }
}

async function reconcile(module: ModuleName, rawParams: unknown, deps: RunnerDeps): Promise<ReconcileOutcome> {
  switch (module) {
    case 'hostgroup': {
      const params = parseModuleParams(module, hostGroupParamsSchema, rawParams);
      return withSession(params, deps, (api) => {
        const reconciler = new HostGroupReconciler(api);
        return params.state === 'present' ? reconciler.create(params.name) : reconciler.delete(params.name);
      });
    }
    case 'template': {
      const params = parseModuleParams(module, templateParamsSchema, rawParams);
      return withSession(params, deps, async (api) => {
        const reconciler = new TemplateReconciler(api, params);
        if (params.state === 'dump') {
          return { changed: false, message: await reconciler.dump() };
        }
        return params.state === 'present' ? reconciler.create() : reconciler.delete();
      });
    }
    case 'host': {
      const params = parseModuleParams(module, hostParamsSchema, rawParams);
      return withSession(params, deps, (api) => {
        const reconciler = new HostReconciler(api, params);
        return params.state === 'present' ? reconciler.create() : reconciler.delete();
      });
    }
  }
}

/**
 * Run one reconcile module to completion.
 * Every failure is fatal: the first error ends the run and comes back as `{ ok: false }`.
 */
export async function runModule(
  module: ModuleName,
  rawParams: unknown,
  deps: Partial<RunnerDeps> = {}
): Promise<ModuleResult> {
  const resolved: RunnerDeps = {
    config: deps.config ?? defaultConfig,
    createSession: deps.createSession ?? ((options) => new RpcClient(options)),
  };

  try {
    const outcome = await reconcile(module, rawParams, resolved);
    logger.info('Module finished', { module, changed: outcome.changed });
    return { ok: true, ...outcome };
  } catch (error) {
    const kind = error instanceof ReconcileError ? error.kind : 'internal';
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Module failed', { module, kind, error: message });
    return { ok: false, changed: false, error: { kind, message } };
  }
}
