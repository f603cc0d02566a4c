/**
 * Type definitions for the monitoring reconcilers
 */

export type HostStatusCode = '0' | '1';

export type InterfaceTypeName = 'agent' | 'SNMP' | 'IPMI' | 'JMX';
export type InterfaceTypeCode = '1' | '2' | '3' | '4';

export interface GroupRef {
  groupid: string;
}

export interface TemplateRef {
  templateid: string;
}

export interface HostInterfaceSpec {
  interfaceid?: string;
  type: InterfaceTypeCode;
  main: string;
  useip: '0' | '1';
  ip: string;
  dns: string;
  port: string;
}

// Request structs, one per server action

export interface NameFilterGetParams {
  output: string[];
  filter: Record<string, string[]>;
}

export interface HostGetParams extends NameFilterGetParams {
  selectGroups?: string[];
  selectParentTemplates?: string[];
  selectInterfaces?: string[];
}

export interface HostGroupCreateParams {
  name: string;
}

export interface TemplateCreateParams {
  host: string;
  groups: GroupRef[];
}

export interface HostCreateParams {
  host: string;
  interfaces: HostInterfaceSpec[];
  groups: GroupRef[];
  templates?: TemplateRef[];
  name?: string;
  status?: HostStatusCode;
}

export interface HostUpdateParams {
  hostid: string;
  status: HostStatusCode;
  name: string;
  templates: TemplateRef[];
  groups: GroupRef[];
}

export interface HostInterfaceGetParams {
  output: string[];
  hostids: string[];
}

export interface ConfigurationExportParams {
  format: 'json';
  options: { templates: string[] };
}

export interface ImportRule {
  createMissing: boolean;
  updateExisting?: boolean;
}

export interface ConfigurationImportParams {
  format: 'json';
  source: string;
  rules: Record<string, ImportRule>;
}

// What the reconcilers report back to the entry point

export interface ReconcileOutcome {
  changed: boolean;
  message?: string;
}

/**
 * The fields of a host that take part in the desired-vs-current comparison.
 */
export interface HostSnapshot {
  templateIds: string[];
  visibleName: string;
  groupIds: string[];
  status: HostStatusCode;
  iface: Pick<HostInterfaceSpec, 'ip' | 'dns' | 'useip' | 'type' | 'port'>;
}
