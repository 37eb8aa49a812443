/**
 * Access to the observation database.
 *
 * The spec generator only sees the `ObservationSource` interface;
 * `PgObservationSource` implements it over PostgreSQL with the `pg` client.
 */

import pg from "pg";
import type { Pool } from "pg";
import { Arm } from "../spec/enums.js";
import type { BeamConfig, FileId } from "../visits/file-id.js";
import { criteriaToSql, type SelectionCriteria } from "./criteria.js";

export interface SourceQuery {
  /** `sps_sequence.sequence_type`, e.g. "scienceArc" */
  sequenceType: string;
  arm: Arm;
  criteria: SelectionCriteria;
  /** Restrict to one beam configuration */
  beamConfig?: BeamConfig;
}

export interface ObservationSource {
  /** Distinct beam configurations of the given sequence types */
  getBeamConfigs(
    sequenceTypes: readonly string[],
    criteria: SelectionCriteria
  ): Promise<BeamConfig[]>;
  /** Usable exposures; flagged ones are left out */
  getSources(query: SourceQuery): Promise<FileId[]>;
}

type BeamConfigRow = {
  beam_config_date: number | string;
  pfs_design_id: number | string;
};

type FileIdRow = {
  pfs_visit_id: number | string;
  arm: string;
  sps_module_id: number | string;
};

function toFileId(row: FileIdRow): FileId {
  const arm = Arm.safeParse(row.arm);
  if (!arm.success) {
    throw new Error(`Unknown arm in observation database: '${row.arm}'`);
  }
  return {
    visit: Number(row.pfs_visit_id),
    arm: arm.data,
    spectrograph: Number(row.sps_module_id),
  };
}

export class PgObservationSource implements ObservationSource {
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString, max: 2, idleTimeoutMillis: 10_000 });
  }

  async getBeamConfigs(
    sequenceTypes: readonly string[],
    criteria: SelectionCriteria
  ): Promise<BeamConfig[]> {
    if (sequenceTypes.length === 0) {
      return [];
    }

    const placeholders = sequenceTypes.map((_, i) => `$${i + 1}`).join(", ");
    const condition = criteriaToSql(criteria, sequenceTypes.length + 1);
    const res = await this.pool.query<BeamConfigRow>(
      `SELECT beam_config_date, pfs_design_id
       FROM visit_set
         JOIN sps_sequence USING (visit_set_id)
         JOIN sps_exposure USING (pfs_visit_id)
         JOIN pfs_visit USING (pfs_visit_id)
       WHERE sequence_type IN (${placeholders})
         AND ${condition.text}
       GROUP BY beam_config_date, pfs_design_id`,
      [...sequenceTypes, ...condition.values]
    );

    return res.rows.map((row) => ({
      beamConfigDate: Number(row.beam_config_date),
      pfsDesignId: Number(row.pfs_design_id),
    }));
  }

  async getSources(query: SourceQuery): Promise<FileId[]> {
    const params: (string | number)[] = [query.sequenceType, query.arm];
    let beamFilter = "";
    if (query.beamConfig !== undefined) {
      params.push(query.beamConfig.beamConfigDate, query.beamConfig.pfsDesignId);
      beamFilter = "AND beam_config_date = $3 AND pfs_design_id = $4";
    }
    const condition = criteriaToSql(query.criteria, params.length + 1);

    const res = await this.pool.query<FileIdRow>(
      `SELECT pfs_visit_id, arm, sps_module_id
       FROM sps_sequence
         JOIN visit_set USING (visit_set_id)
         JOIN pfs_visit USING (pfs_visit_id)
         JOIN sps_exposure USING (pfs_visit_id)
         JOIN sps_camera USING (sps_camera_id)
         LEFT JOIN sps_annotation USING (pfs_visit_id, sps_camera_id)
       WHERE sps_sequence.sequence_type = $1
         AND sps_camera.arm = $2
         ${beamFilter}
         AND (sps_annotation.data_flag IS NULL OR sps_annotation.data_flag = 0)
         AND ${condition.text}`,
      [...params, ...condition.values]
    );

    return res.rows.map(toFileId);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
