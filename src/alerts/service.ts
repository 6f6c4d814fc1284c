import type { Alert, AlertFilter, AlertStatus } from '../types/index.js';
import type { AlertStore } from '../store/index.js';
import type { AuditAction } from '../audit/index.js';
import { audit } from '../audit/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { NotFoundError, errorMessage } from '../errors.js';
import { assertTransition } from './lifecycle.js';

export interface AlertStatistics {
  total: number;
  byStatus: Record<AlertStatus, number>;
}

const TRANSITION_AUDIT: Record<Exclude<AlertStatus, 'OPEN'>, AuditAction> = {
  ACKNOWLEDGED: 'alert.acknowledge',
  RESOLVED: 'alert.resolve',
  FALSE_POSITIVE: 'alert.false_positive',
};

/** Operator actions on existing alerts. */
export class AlertService {
  constructor(
    private readonly alerts: AlertStore,
    private readonly log: Logger = silentLogger,
  ) {}

  async get(id: string): Promise<Alert> {
    const alert = await this.alerts.findById(id);
    if (!alert) throw new NotFoundError('Alert', id);
    return alert;
  }

  list(filter?: AlertFilter): Promise<Alert[]> {
    return this.alerts.list(filter);
  }

  acknowledge(id: string, actor: string): Promise<Alert> {
    return this.transition(id, 'ACKNOWLEDGED', actor);
  }

  resolve(id: string, actor: string, notes?: string): Promise<Alert> {
    return this.transition(id, 'RESOLVED', actor, notes);
  }

  markFalsePositive(id: string, actor: string, notes?: string): Promise<Alert> {
    return this.transition(id, 'FALSE_POSITIVE', actor, notes);
  }

  async statistics(): Promise<AlertStatistics> {
    const byStatus = await this.alerts.countByStatus();
    const total = Object.values(byStatus).reduce((sum, n) => sum + n, 0);
    return { total, byStatus };
  }

  private async transition(
    id: string,
    to: Exclude<AlertStatus, 'OPEN'>,
    actor: string,
    notes?: string,
  ): Promise<Alert> {
    const current = await this.get(id);
    const action = TRANSITION_AUDIT[to];
    try {
      // Fail fast with the state the caller saw; the store re-checks atomically.
      assertTransition(current.status, to, id);
      const updated = await this.alerts.transitionStatus(id, current.status, to, actor, notes);
      this.log.info(`Alert ${id} ${current.status} -> ${to}`, { actor });
      await audit(action, {
        alertId: id,
        ruleId: updated.alertRuleId,
        actor,
        detail: { from: current.status },
      });
      return updated;
    } catch (err) {
      await audit(action, {
        alertId: id,
        ruleId: current.alertRuleId,
        actor,
        success: false,
        error: errorMessage(err),
      });
      throw err;
    }
  }
}
