import type { AccessContext, AuditLogger } from "../audit/audit-logger.js";
import { isPatientDirectoryError } from "../errors.js";
import { normalize } from "../mapping/patient-normalizer.js";
import type { AliasTable, PatientSet } from "../mapping/types.js";
import type { PatientListQuery } from "../patient-api/client.js";
import type { PatientQuery } from "../presentation/presenter.js";

/**
 * Anything that can fetch the raw patient list; the HTTP client in production,
 * an in-memory fake in tests.
 */
export interface PatientSource {
  fetchPatients(query: PatientListQuery): Promise<unknown>;
}

export interface PatientListResult {
  patients: PatientSet;
  query: PatientQuery;
}

export class PatientTools {
  constructor(
    private readonly source: PatientSource,
    private readonly aliasTable: AliasTable,
    private readonly defaultLimit: number,
    private readonly audit: AuditLogger,
  ) {}

  /**
   * Fetches and normalizes the patient list. Upstream failures are audited and
   * rethrown as-is for the caller to present.
   */
  async getPatientList(args: PatientListQuery, context: AccessContext): Promise<PatientListResult> {
    const nameFilter = args.patientName?.trim() || undefined;
    const limit = args.limit ?? this.defaultLimit;
    const query: PatientQuery = { nameFilter, limit };
    const auditQuery = { patientName: nameFilter, limit };

    try {
      const body = await this.source.fetchPatients({ patientName: nameFilter, limit });
      const patients = normalize(body, this.aliasTable, query);
      this.audit.logPatientLookup(context, auditQuery, {
        outcome: patients.length > 0 ? "success" : "no_match",
        resultCount: patients.length,
      });
      return { patients, query };
    } catch (err) {
      this.audit.logPatientLookup(context, auditQuery, {
        outcome: "error",
        resultCount: 0,
        errorKind: isPatientDirectoryError(err) ? err.kind : "unexpected",
      });
      throw err;
    }
  }
}
