/**
 * Extraction Store
 *
 * Repository for extracted objects and project indices, keyed by project and
 * page. Replacing a page's objects is atomic per page; the index is replaced
 * wholesale. The in-memory implementation backs tests and callers that
 * persist elsewhere.
 */

import type { ExtractedObject, ProjectIndex } from '../contracts/types.js';
import { logger } from '../utils/logger.js';

/**
 * Repository interface for extraction results
 */
export interface IExtractionStore {
  replacePageObjects(projectId: string, pageId: string, objects: readonly ExtractedObject[]): Promise<void>;
  getPageObjects(projectId: string, pageId: string): Promise<ExtractedObject[]>;
  /** All objects of a project, pages in first-written order */
  listProjectObjects(projectId: string): Promise<ExtractedObject[]>;
  saveIndex(index: ProjectIndex): Promise<void>;
  getIndex(projectId: string): Promise<ProjectIndex | null>;
}

interface ObjectLocation {
  pageId: string;
  label: string;
}

export class InMemoryExtractionStore implements IExtractionStore {
  private readonly pages = new Map<string, Map<string, ExtractedObject[]>>();
  private readonly locations = new Map<string, Map<string, ObjectLocation>>();
  private readonly indices = new Map<string, ProjectIndex>();

  async replacePageObjects(projectId: string, pageId: string, objects: readonly ExtractedObject[]): Promise<void> {
    const projectPages = this.projectPages(projectId);
    const locations = this.projectLocations(projectId);

    // Forget the page's previous objects
    for (const previous of projectPages.get(pageId) ?? []) {
      if (locations.get(previous.id)?.pageId === pageId) {
        locations.delete(previous.id);
      }
    }

    const byId = new Map<string, ExtractedObject>();
    for (const object of objects) {
      const existing = byId.get(object.id) ?? this.lookup(projectId, object.id);
      if (existing && existing.label !== object.label) {
        logger.warn(
          { projectId, pageId, objectId: object.id, previousLabel: existing.label, label: object.label },
          'Object id collision, last write wins'
        );
      }
      if (existing && existing.pageId !== pageId) {
        this.removeFromPage(projectId, existing.pageId, object.id);
      }
      byId.set(object.id, object);
      locations.set(object.id, { pageId, label: object.label });
    }

    projectPages.set(pageId, [...byId.values()]);
  }

  async getPageObjects(projectId: string, pageId: string): Promise<ExtractedObject[]> {
    return [...(this.pages.get(projectId)?.get(pageId) ?? [])];
  }

  async listProjectObjects(projectId: string): Promise<ExtractedObject[]> {
    const projectPages = this.pages.get(projectId);
    return projectPages ? [...projectPages.values()].flat() : [];
  }

  async saveIndex(index: ProjectIndex): Promise<void> {
    this.indices.set(index.projectId, index);
  }

  async getIndex(projectId: string): Promise<ProjectIndex | null> {
    return this.indices.get(projectId) ?? null;
  }

  private projectPages(projectId: string): Map<string, ExtractedObject[]> {
    let projectPages = this.pages.get(projectId);
    if (!projectPages) {
      projectPages = new Map();
      this.pages.set(projectId, projectPages);
    }
    return projectPages;
  }

  private projectLocations(projectId: string): Map<string, ObjectLocation> {
    let locations = this.locations.get(projectId);
    if (!locations) {
      locations = new Map();
      this.locations.set(projectId, locations);
    }
    return locations;
  }

  private lookup(projectId: string, objectId: string): ObjectLocation | undefined {
    return this.locations.get(projectId)?.get(objectId);
  }

  private removeFromPage(projectId: string, pageId: string, objectId: string): void {
    const projectPages = this.pages.get(projectId);
    const objects = projectPages?.get(pageId);
    if (projectPages && objects) {
      projectPages.set(
        pageId,
        objects.filter((object) => object.id !== objectId)
      );
    }
  }
}
