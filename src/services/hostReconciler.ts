import { LookupError } from '../errors';
import type {
  HostInterfaceSpec,
  HostSnapshot,
  HostStatusCode,
  InterfaceTypeName,
  ReconcileOutcome,
} from '../types';
import { logger } from '../utils/logger';
import { buildInterface } from './hostInterface';
import type { HostRecord, MonitoringApi } from './monitoringApi';

export type HostStatusInput = 'monitored' | 'unmonitored' | 'yes' | 'no';

export interface HostReconcilerParams {
  name: string;
  visible?: string;
  groups: string;
  templates: string;
  status: HostStatusInput;
  dns?: string;
  ip?: string;
  port?: string;
  main: string;
  type: InterfaceTypeName;
}

const STATUS_CODES: Record<HostStatusInput, HostStatusCode> = {
  monitored: '0',
  yes: '0',
  unmonitored: '1',
  no: '1',
};

export function splitNames(csv: string): string[] {
  return csv
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function sameSet(left: string[], right: string[]): boolean {
  if (left.length !== right.length) {
    return false;
  }
  const sortedRight = [...right].sort();
  return [...left].sort().every((value, index) => value === sortedRight[index]);
}

/**
 * Compare two host snapshots; group and template order does not matter.
 */
export function snapshotsEqual(desired: HostSnapshot, current: HostSnapshot): boolean {
  return (
    sameSet(desired.templateIds, current.templateIds) &&
    desired.visibleName === current.visibleName &&
    sameSet(desired.groupIds, current.groupIds) &&
    desired.status === current.status &&
    desired.iface.ip === current.iface.ip &&
    desired.iface.dns === current.iface.dns &&
    desired.iface.useip === current.iface.useip &&
    desired.iface.type === current.iface.type &&
    desired.iface.port === current.iface.port
  );
}

/**
 * Host reconciler
 * Converges a host, its group and template links and its single interface
 */
export class HostReconciler {
  constructor(
    private readonly api: MonitoringApi,
    private readonly params: HostReconcilerParams
  ) {}

  public async getId(name = this.params.name): Promise<string | null> {
    const hosts = await this.api.host.get({ output: ['hostid'], filter: { host: [name] } });
    logger.debug('Looked up host', { name, found: hosts.length > 0 });
    return hosts[0]?.hostid ?? null;
  }

  public async exists(name = this.params.name): Promise<boolean> {
    return (await this.getId(name)) !== null;
  }

  public async resolveGroups(csv = this.params.groups): Promise<string[]> {
    const groupIds: string[] = [];
    for (const name of splitNames(csv)) {
      const groups = await this.api.hostgroup.get({ output: ['groupid'], filter: { name: [name] } });
      const groupId = groups[0]?.groupid;
      if (groupId === undefined) {
        throw new LookupError('hostgroup', name);
      }
      groupIds.push(groupId);
    }
    return groupIds;
  }

  public async resolveTemplates(csv = this.params.templates): Promise<string[]> {
    const templateIds: string[] = [];
    for (const name of splitNames(csv)) {
      const templates = await this.api.template.get({
        output: ['templateid'],
        filter: { host: [name] },
      });
      const templateId = templates[0]?.templateid;
      if (templateId === undefined) {
        throw new LookupError('template', name);
      }
      templateIds.push(templateId);
    }
    return templateIds;
  }

  public buildInterface(existingInterfaceId?: string): HostInterfaceSpec {
    const { type, dns, ip, port, main } = this.params;
    return buildInterface({ type, dns, ip, port, main }, existingInterfaceId);
  }

  public async create(): Promise<ReconcileOutcome> {
    const iface = this.buildInterface();

    const current = await this.fetchCurrent();
    if (current === null) {
      return this.createHost(iface);
    }

    const desired = await this.desiredSnapshot(iface);
    if (snapshotsEqual(desired, this.currentSnapshot(current))) {
      logger.debug('Host already converged', { name: this.params.name });
      return { changed: false };
    }

    await this.updateHost(current.hostid, desired);
    return { changed: true };
  }

  public async delete(): Promise<ReconcileOutcome> {
    const hostId = await this.getId();
    if (hostId === null) {
      return { changed: false };
    }

    await this.api.host.delete([hostId]);
    logger.info('Deleted host', { name: this.params.name, hostId });
    return { changed: true };
  }

  private async createHost(iface: HostInterfaceSpec): Promise<ReconcileOutcome> {
    const { name, visible } = this.params;
    const groupIds = await this.resolveGroups();
    const templateIds = await this.resolveTemplates();

    const { hostids } = await this.api.host.create({
      host: name,
      interfaces: [iface],
      groups: groupIds.map((groupid) => ({ groupid })),
      ...(templateIds.length > 0 ? { templates: templateIds.map((templateid) => ({ templateid })) } : {}),
      ...(visible ? { name: visible } : {}),
      status: STATUS_CODES[this.params.status],
    });

    logger.info('Created host', { name, hostId: hostids[0] });
    return { changed: true };
  }

  // Entity fields and the interface are pushed in two calls; a failure in between is reported, not rolled back
  private async updateHost(hostId: string, desired: HostSnapshot): Promise<void> {
    await this.api.host.update({
      hostid: hostId,
      status: desired.status,
      name: desired.visibleName,
      templates: desired.templateIds.map((templateid) => ({ templateid })),
      groups: desired.groupIds.map((groupid) => ({ groupid })),
    });

    const interfaces = await this.api.hostinterface.get({
      output: ['interfaceid'],
      hostids: [hostId],
    });
    const interfaceId = interfaces[0]?.interfaceid;
    if (interfaceId === undefined) {
      throw new LookupError('hostinterface', this.params.name);
    }

    await this.api.hostinterface.update(this.buildInterface(interfaceId));
    logger.info('Updated host', { name: this.params.name, hostId, interfaceId });
  }

  private async fetchCurrent(): Promise<HostRecord | null> {
    const hosts = await this.api.host.get({
      output: ['hostid', 'host', 'name', 'status'],
      filter: { host: [this.params.name] },
      selectGroups: ['groupid'],
      selectParentTemplates: ['templateid'],
      selectInterfaces: ['interfaceid', 'ip', 'dns', 'useip', 'type', 'port', 'main'],
    });
    return hosts[0] ?? null;
  }

  private async desiredSnapshot(iface: HostInterfaceSpec): Promise<HostSnapshot> {
    return {
      templateIds: await this.resolveTemplates(),
      visibleName: this.params.visible || this.params.name,
      groupIds: await this.resolveGroups(),
      status: STATUS_CODES[this.params.status],
      iface: { ip: iface.ip, dns: iface.dns, useip: iface.useip, type: iface.type, port: iface.port },
    };
  }

  private currentSnapshot(host: HostRecord): HostSnapshot {
    const [iface] = host.interfaces;
    return {
      templateIds: host.parentTemplates.map((template) => template.templateid),
      visibleName: host.name || host.host || this.params.name,
      groupIds: host.groups.map((group) => group.groupid),
      status: host.status === '1' ? '1' : '0',
      iface: {
        ip: iface?.ip ?? '',
        dns: iface?.dns ?? '',
        useip: iface?.useip === '0' ? '0' : '1',
        type: toInterfaceTypeCode(iface?.type),
        port: iface?.port ?? '',
      },
    };
  }
}

function toInterfaceTypeCode(value: string | undefined): HostSnapshot['iface']['type'] {
  switch (value) {
    case '2':
    case '3':
    case '4':
      return value;
    default:
      return '1';
  }
}
