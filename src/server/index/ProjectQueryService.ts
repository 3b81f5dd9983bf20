/**
 * Project Query Service
 *
 * Read side over an extraction store: the current project index and
 * ambiguity-preserving lookups against it.
 */

import type { ProjectIndex, QueryCriteria, QueryResult } from '../contracts/types.js';
import type { IExtractionStore } from '../stores/ExtractionStore.js';
import { emptyProjectIndex } from './ProjectIndexBuilder.js';
import { resolveQuery } from './QueryResolver.js';

export class ProjectQueryService {
  constructor(
    private readonly store: IExtractionStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * The stored index, or empty maps when no run has completed for the project
   */
  async getProjectIndex(projectId: string): Promise<ProjectIndex> {
    return (await this.store.getIndex(projectId)) ?? emptyProjectIndex(projectId, this.now());
  }

  /**
   * @throws {EmptyQueryError} when no criterion is given
   */
  async query(projectId: string, criteria: QueryCriteria): Promise<QueryResult> {
    const [index, objects] = await Promise.all([
      this.store.getIndex(projectId),
      this.store.listProjectObjects(projectId),
    ]);
    return resolveQuery(projectId, criteria, index, objects);
  }
}
