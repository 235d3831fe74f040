import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ScenarioRow } from '../interfaces/port-records.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import type {
  ScenarioBreakdown,
  ScenarioVariables,
} from '../interfaces/scenario.interface';
import {
  PORT_STORE,
  SHIP_PREFIX,
  TRUCK_PREFIX,
} from '../port-operations.constants';
import { toTimestampString } from '../utils/format-timestamp';

/**
 * Rebuilds initial variable sets from relational state. Recomputed on every
 * call; nothing is cached.
 */
@Injectable()
export class ScenarioReconstructor {
  private readonly logger = new Logger(ScenarioReconstructor.name);

  constructor(@Inject(PORT_STORE) private readonly store: IPortStore) {}

  async listStartableScenarios(): Promise<ScenarioVariables[]> {
    const rows = await this.store.listScenarioRows();
    const scenarios: ScenarioVariables[] = [];

    for (const row of rows) {
      const scenario = this.toScenario(row);
      if (scenario) scenarios.push(scenario);
    }

    this.logger.log(
      `Reconstructed ${scenarios.length} startable scenario(s) from ${rows.length} transport row(s)`,
    );
    return scenarios;
  }

  summarize(scenarios: ScenarioVariables[]): ScenarioBreakdown {
    return {
      total: scenarios.length,
      ships: scenarios.filter((s) => s.transportationId.startsWith(SHIP_PREFIX)).length,
      trucks: scenarios.filter((s) => s.transportationId.startsWith(TRUCK_PREFIX)).length,
      loading: scenarios.filter((s) => s.operationType === 'loading').length,
      unloading: scenarios.filter((s) => s.operationType === 'unloading').length,
    };
  }

  private toScenario(row: ScenarioRow): ScenarioVariables | null {
    const transportationId = String(row.transportation_id);
    const scenario: ScenarioVariables = {
      containerId: row.container_id,
      transportationId,
      operationType: row.operation_type,
      weight: Number(row.weight),
      storageStatus: row.storage_status,
    };

    if (!transportationId.startsWith(TRUCK_PREFIX)) {
      return scenario;
    }

    const checkIn = row.check_in ? toTimestampString(row.check_in) : null;
    const checkOut = row.check_out ? toTimestampString(row.check_out) : null;
    if (!checkIn || !checkOut) {
      this.logger.debug(
        `Skipping truck ${transportationId} (${row.container_id}): missing gate timestamps`,
      );
      return null;
    }

    return { ...scenario, checkIn, checkOut };
  }
}
