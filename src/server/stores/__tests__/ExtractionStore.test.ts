import { describe, it, expect } from 'vitest';
import type { ExtractedRoom } from '../../contracts/types.js';
import { buildProjectIndex } from '../../index/ProjectIndexBuilder.js';
import { InMemoryExtractionStore } from '../ExtractionStore.js';

function room(id: string, pageId: string, label: string): ExtractedRoom {
  return {
    id,
    type: 'room',
    pageId,
    label,
    geometry: { type: 'bbox', bbox: [0, 0, 10, 10] },
    confidence: 0.9,
    sources: ['text_detected'],
    roomName: label,
  };
}

describe('InMemoryExtractionStore', () => {
  it('replaces a page wholesale', async () => {
    const store = new InMemoryExtractionStore();
    await store.replacePageObjects('project-1', 'p1', [room('room_a', 'p1', 'HALL'), room('room_b', 'p1', 'LABO')]);
    await store.replacePageObjects('project-1', 'p1', [room('room_c', 'p1', 'CLASSE')]);

    const objects = await store.getPageObjects('project-1', 'p1');
    expect(objects.map((object) => object.id)).toEqual(['room_c']);
  });

  it('lists pages in first-written order', async () => {
    const store = new InMemoryExtractionStore();
    await store.replacePageObjects('project-1', 'p2', [room('room_b', 'p2', 'LABO')]);
    await store.replacePageObjects('project-1', 'p1', [room('room_a', 'p1', 'HALL')]);
    await store.replacePageObjects('project-1', 'p2', [room('room_c', 'p2', 'CLASSE')]);

    const objects = await store.listProjectObjects('project-1');
    expect(objects.map((object) => object.id)).toEqual(['room_c', 'room_a']);
  });

  it('keeps the last write for a colliding id', async () => {
    const store = new InMemoryExtractionStore();
    await store.replacePageObjects('project-1', 'p1', [room('room_x', 'p1', 'HALL')]);
    await store.replacePageObjects('project-1', 'p2', [room('room_x', 'p2', 'LOBBY')]);

    expect(await store.getPageObjects('project-1', 'p1')).toEqual([]);
    expect((await store.listProjectObjects('project-1')).map((object) => object.label)).toEqual(['LOBBY']);
  });

  it('collapses duplicate ids within one write', async () => {
    const store = new InMemoryExtractionStore();
    await store.replacePageObjects('project-1', 'p1', [room('room_x', 'p1', 'HALL'), room('room_x', 'p1', 'HALL B')]);

    expect((await store.getPageObjects('project-1', 'p1')).map((object) => object.label)).toEqual(['HALL B']);
  });

  it('keeps projects apart', async () => {
    const store = new InMemoryExtractionStore();
    await store.replacePageObjects('project-1', 'p1', [room('room_a', 'p1', 'HALL')]);
    const index = buildProjectIndex('project-1', [], new Date('2026-01-01T00:00:00Z'));
    await store.saveIndex(index);

    expect(await store.listProjectObjects('project-2')).toEqual([]);
    expect(await store.getIndex('project-2')).toBeNull();
    expect(await store.getIndex('project-1')).toBe(index);
  });
});
