import type { ReportSink } from '@core/ports';
import type { Database } from './connection';
import { reports } from './schema/reports';

export class DrizzleReportSink implements ReportSink {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async report(reportId: string, group: string, payload: Record<string, unknown>): Promise<void> {
    await this.db.insert(reports).values({ reportId, group, payload });
  }
}
