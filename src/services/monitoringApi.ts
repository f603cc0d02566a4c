import { z } from 'zod';
import { ProtocolError } from '../errors';
import type {
  ConfigurationExportParams,
  ConfigurationImportParams,
  HostCreateParams,
  HostGetParams,
  HostGroupCreateParams,
  HostInterfaceGetParams,
  HostInterfaceSpec,
  HostUpdateParams,
  NameFilterGetParams,
  TemplateCreateParams,
} from '../types';
import type { RpcCaller } from './rpcClient';

// The server sends ids and numeric enums as strings, older releases sometimes as numbers
const idSchema = z.union([z.string(), z.number()]).transform(String);

export const hostGroupSchema = z.object({
  groupid: idSchema,
  name: z.string().optional(),
});

export const templateSchema = z.object({
  templateid: idSchema,
  host: z.string().optional(),
});

export const hostInterfaceSchema = z.object({
  interfaceid: idSchema,
  ip: z.string().default(''),
  dns: z.string().default(''),
  useip: idSchema.default('1'),
  type: idSchema.default('1'),
  port: idSchema.default(''),
  main: idSchema.default('1'),
});

export const hostSchema = z.object({
  hostid: idSchema,
  host: z.string().optional(),
  name: z.string().optional(),
  status: idSchema.optional(),
  groups: z.array(z.object({ groupid: idSchema })).default([]),
  parentTemplates: z.array(z.object({ templateid: idSchema })).default([]),
  interfaces: z.array(hostInterfaceSchema).default([]),
});

const groupIdsSchema = z.object({ groupids: z.array(idSchema) });
const templateIdsSchema = z.object({ templateids: z.array(idSchema) });
const hostIdsSchema = z.object({ hostids: z.array(idSchema) });
const interfaceIdsSchema = z.object({ interfaceids: z.array(idSchema) });

export type HostGroupRecord = z.infer<typeof hostGroupSchema>;
export type TemplateRecord = z.infer<typeof templateSchema>;
export type HostRecord = z.infer<typeof hostSchema>;
export type HostInterfaceRecord = z.infer<typeof hostInterfaceSchema>;

/**
 * Explicit method table over the JSON-RPC API
 * Each entry names one `<entity>.<method>` and validates what the server returns
 */
export class MonitoringApi {
  constructor(private readonly rpc: RpcCaller) {}

  public readonly hostgroup = {
    get: (params: NameFilterGetParams) =>
      this.invoke('hostgroup', 'get', params, z.array(hostGroupSchema)),
    create: (params: HostGroupCreateParams) =>
      this.invoke('hostgroup', 'create', params, groupIdsSchema),
    delete: (groupIds: string[]) =>
      this.invoke('hostgroup', 'delete', groupIds, groupIdsSchema),
  };

  public readonly template = {
    get: (params: NameFilterGetParams) =>
      this.invoke('template', 'get', params, z.array(templateSchema)),
    create: (params: TemplateCreateParams) =>
      this.invoke('template', 'create', params, templateIdsSchema),
    delete: (templateIds: string[]) =>
      this.invoke('template', 'delete', templateIds, templateIdsSchema),
  };

  public readonly host = {
    get: (params: HostGetParams) => this.invoke('host', 'get', params, z.array(hostSchema)),
    create: (params: HostCreateParams) =>
      this.invoke('host', 'create', params, hostIdsSchema),
    update: (params: HostUpdateParams) =>
      this.invoke('host', 'update', params, hostIdsSchema),
    delete: (hostIds: string[]) => this.invoke('host', 'delete', hostIds, hostIdsSchema),
  };

  public readonly hostinterface = {
    get: (params: HostInterfaceGetParams) =>
      this.invoke('hostinterface', 'get', params, z.array(z.object({ interfaceid: idSchema }))),
    update: (params: HostInterfaceSpec) =>
      this.invoke('hostinterface', 'update', params, interfaceIdsSchema),
  };

  public readonly configuration = {
    export: (params: ConfigurationExportParams) =>
      this.invoke('configuration', 'export', params, z.string()),
    import: (params: ConfigurationImportParams) =>
      this.invoke('configuration', 'import', params, z.boolean()),
  };

  private async invoke<T extends z.ZodTypeAny>(
    entity: string,
    method: string,
    params: unknown,
    schema: T
  ): Promise<z.output<T>> {
    const result = await this.rpc.call(entity, method, params);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ProtocolError(`${entity}.${method} returned an unexpected result: ${issues}`);
    }
    return parsed.data;
  }
}
