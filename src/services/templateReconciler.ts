import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';
import { LookupError, ProtocolError, ValidationError } from '../errors';
import type { ImportRule, ReconcileOutcome } from '../types';
import { logger } from '../utils/logger';
import type { MonitoringApi } from './monitoringApi';

// Templates are created in the server's built-in "Templates" group
export const DEFAULT_TEMPLATE_GROUP_ID = '1';

const UPSERT: ImportRule = { createMissing: true, updateExisting: true };

export const TEMPLATE_IMPORT_RULES: Record<string, ImportRule> = {
  groups: { createMissing: true },
  templates: UPSERT,
  items: UPSERT,
  triggers: UPSERT,
  graphs: UPSERT,
  discoveryRules: UPSERT,
};

type JsonObject = Record<string, unknown>;

const declaredTemplatesSchema = z.object({
  zabbix_export: z.object({
    templates: z.array(z.object({ template: z.string() })).default([]),
  }),
});

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse an export document. Malformed desired input is the caller's fault,
 * a malformed export is the server's.
 */
export function parseExportDocument(text: string, origin: 'desired' | 'current'): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const message = `${origin === 'desired' ? 'Desired' : 'Exported'} template document is not valid JSON: ${reason}`;
    throw origin === 'desired' ? new ValidationError(message) : new ProtocolError(message);
  }

  if (!isJsonObject(parsed)) {
    const message = `${origin === 'desired' ? 'Desired' : 'Exported'} template document must be a JSON object`;
    throw origin === 'desired' ? new ValidationError(message) : new ProtocolError(message);
  }

  return parsed;
}

/**
 * Drop the export timestamp, which changes on every export.
 */
export function stripVolatileFields(document: JsonObject): JsonObject {
  const stripped: JsonObject = { ...document };
  delete stripped.date;

  const exportSection = stripped.zabbix_export;
  if (isJsonObject(exportSection)) {
    const section: JsonObject = { ...exportSection };
    delete section.date;
    stripped.zabbix_export = section;
  }

  return stripped;
}

export function declaredTemplateNames(document: JsonObject): string[] {
  const parsed = declaredTemplatesSchema.safeParse(document);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.zabbix_export.templates.map((entry) => entry.template);
}

export interface TemplateReconcilerParams {
  name: string;
  json: string;
}

/**
 * Template reconciler
 * Creates, deletes, exports and converges a template's configuration document
 */
export class TemplateReconciler {
  constructor(
    private readonly api: MonitoringApi,
    private readonly params: TemplateReconcilerParams
  ) {}

  public async getId(name = this.params.name): Promise<string | null> {
    const templates = await this.api.template.get({
      output: ['templateid', 'host'],
      filter: { host: [name] },
    });
    logger.debug('Looked up template', { name, found: templates.length > 0 });
    return templates[0]?.templateid ?? null;
  }

  public async dump(): Promise<string> {
    const templateId = await this.getId();
    if (templateId === null) {
      throw new LookupError('template', this.params.name);
    }
    return this.exportDocument(templateId);
  }

  public async diff(desiredJson = this.params.json): Promise<ReconcileOutcome> {
    if (desiredJson.trim().length === 0) {
      return { changed: false };
    }

    const desired = this.parseDesired(desiredJson);
    const current = parseExportDocument(await this.dump(), 'current');

    if (isDeepStrictEqual(stripVolatileFields(current), stripVolatileFields(desired))) {
      logger.debug('Template already matches desired document', { name: this.params.name });
      return { changed: false };
    }

    await this.importDocument(desiredJson);
    return { changed: true };
  }

  public async create(): Promise<ReconcileOutcome> {
    const { name, json } = this.params;
    const hasDocument = json.trim().length > 0;
    if (hasDocument) {
      this.parseDesired(json);
    }

    if ((await this.getId()) !== null) {
      return this.diff(json);
    }

    const { templateids } = await this.api.template.create({
      host: name,
      groups: [{ groupid: DEFAULT_TEMPLATE_GROUP_ID }],
    });
    logger.info('Created template', { name, templateId: templateids[0] });

    if (hasDocument) {
      await this.importDocument(json);
    }

    return { changed: true };
  }

  public async delete(): Promise<ReconcileOutcome> {
    const templateId = await this.getId();
    if (templateId === null) {
      return { changed: false };
    }

    await this.api.template.delete([templateId]);
    logger.info('Deleted template', { name: this.params.name, templateId });
    return { changed: true };
  }

  private parseDesired(json: string): JsonObject {
    const document = parseExportDocument(json, 'desired');
    const declared = declaredTemplateNames(document);
    if (!declared.includes(this.params.name)) {
      const listed = declared.length > 0 ? declared.map((entry) => `'${entry}'`).join(', ') : 'no templates';
      throw new ValidationError(
        `Template document declares ${listed} but template '${this.params.name}' was requested`
      );
    }
    return document;
  }

  private exportDocument(templateId: string): Promise<string> {
    return this.api.configuration.export({
      format: 'json',
      options: { templates: [templateId] },
    });
  }

  private async importDocument(json: string): Promise<void> {
    await this.api.configuration.import({
      format: 'json',
      source: json,
      rules: TEMPLATE_IMPORT_RULES,
    });
    logger.info('Imported template document', { name: this.params.name });
  }
}
