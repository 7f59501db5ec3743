/**
 * Programs HTTP interface (`/programs`)
 */

import {
  parseExistingProgram,
  parseNewProgram,
  type ExistingProgram,
  type NewProgram,
} from '../../models/program.js';
import { withCreationGuard } from '../../models/validation.js';
import {
  HttpInterface,
  assertMatchingId,
  paginationQuery,
  parseList,
  targetQuery,
} from './http-interface.js';
import type { ProgramFilter, ReadOnlyProgramsInterface, ReadWriteProgramsInterface } from './interfaces.js';

export class ProgramsReadOnlyHttpInterface extends HttpInterface implements ReadOnlyProgramsInterface {
  async getPrograms(filter: ProgramFilter = {}): Promise<ExistingProgram[]> {
    return this.request('GET', '/programs', {
      query: { ...targetQuery(filter.target), ...paginationQuery(filter.pagination) },
      parse: parseList(parseExistingProgram),
    });
  }

  async getProgramById(programId: string): Promise<ExistingProgram> {
    return this.request('GET', `/programs/${encodeURIComponent(programId)}`, { parse: parseExistingProgram });
  }
}

export class ProgramsHttpInterface extends ProgramsReadOnlyHttpInterface implements ReadWriteProgramsInterface {
  async createProgram(newProgram: NewProgram): Promise<ExistingProgram> {
    return withCreationGuard('Program', newProgram, async () =>
      this.request('POST', '/programs', { body: parseNewProgram(newProgram), parse: parseExistingProgram })
    );
  }

  async updateProgramById(programId: string, program: ExistingProgram): Promise<ExistingProgram> {
    assertMatchingId('ExistingProgram', 'id', programId, program.id);
    const body = parseExistingProgram(program);
    return this.request('PUT', `/programs/${encodeURIComponent(programId)}`, { body, parse: parseExistingProgram });
  }

  async deleteProgramById(programId: string): Promise<ExistingProgram> {
    return this.request('DELETE', `/programs/${encodeURIComponent(programId)}`, { parse: parseExistingProgram });
  }
}
