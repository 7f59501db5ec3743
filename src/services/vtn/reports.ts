/**
 * Reports HTTP interface (`/reports`)
 */

import { parseExistingReport, parseNewReport, type ExistingReport, type NewReport } from '../../models/report.js';
import { withCreationGuard } from '../../models/validation.js';
import { HttpInterface, assertMatchingId, paginationQuery, parseList } from './http-interface.js';
import type { ReadOnlyReportsInterface, ReadWriteReportsInterface, ReportFilter } from './interfaces.js';

export class ReportsReadOnlyHttpInterface extends HttpInterface implements ReadOnlyReportsInterface {
  async getReports(filter: ReportFilter = {}): Promise<ExistingReport[]> {
    return this.request('GET', '/reports', {
      query: {
        ...paginationQuery(filter.pagination),
        programID: filter.programId,
        eventID: filter.eventId,
        clientName: filter.clientName,
      },
      parse: parseList(parseExistingReport),
    });
  }

  async getReportById(reportId: string): Promise<ExistingReport> {
    return this.request('GET', `/reports/${encodeURIComponent(reportId)}`, { parse: parseExistingReport });
  }
}

export class ReportsHttpInterface extends ReportsReadOnlyHttpInterface implements ReadWriteReportsInterface {
  async createReport(newReport: NewReport): Promise<ExistingReport> {
    return withCreationGuard('Report', newReport, async () =>
      this.request('POST', '/reports', { body: parseNewReport(newReport), parse: parseExistingReport })
    );
  }

  async updateReportById(reportId: string, report: ExistingReport): Promise<ExistingReport> {
    assertMatchingId('ExistingReport', 'id', reportId, report.id);
    const body = parseExistingReport(report);
    return this.request('PUT', `/reports/${encodeURIComponent(reportId)}`, { body, parse: parseExistingReport });
  }

  async deleteReportById(reportId: string): Promise<ExistingReport> {
    return this.request('DELETE', `/reports/${encodeURIComponent(reportId)}`, { parse: parseExistingReport });
  }
}
