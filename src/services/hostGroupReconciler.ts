import type { ReconcileOutcome } from '../types';
import { logger } from '../utils/logger';
import type { MonitoringApi } from './monitoringApi';

/**
 * Host group reconciler
 * Converges a single named host group to present or absent
 */
export class HostGroupReconciler {
  constructor(private readonly api: MonitoringApi) {}

  public async getId(name: string): Promise<string | null> {
    const groups = await this.api.hostgroup.get({
      output: ['groupid', 'name'],
      filter: { name: [name] },
    });
    logger.debug('Looked up host group', { name, found: groups.length > 0 });
    return groups[0]?.groupid ?? null;
  }

  public async exists(name: string): Promise<boolean> {
    return (await this.getId(name)) !== null;
  }

  public async create(name: string): Promise<ReconcileOutcome> {
    if (await this.exists(name)) {
      return { changed: false };
    }

    const { groupids } = await this.api.hostgroup.create({ name });
    logger.info('Created host group', { name, groupId: groupids[0] });
    return { changed: true };
  }

  public async delete(name: string): Promise<ReconcileOutcome> {
    const groupId = await this.getId(name);
    if (groupId === null) {
      return { changed: false };
    }

    await this.api.hostgroup.delete([groupId]);
    logger.info('Deleted host group', { name, groupId });
    return { changed: true };
  }
}
