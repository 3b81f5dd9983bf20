import { describe, it, expect } from 'vitest';
import {
  bucketCoordinate,
  bucketCorners,
  generateDoorId,
  generateObjectId,
  generateRoomId,
  generateScheduleTableId,
  normalizeLabel,
} from '../objectIdGenerator.js';

describe('normalizeLabel', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(normalizeLabel('  Classe   203! ')).toBe('classe 203');
    expect(normalizeLabel('Salle-Info')).toBe('salleinfo');
    expect(normalizeLabel('Élève\tB')).toBe('élève b');
    expect(normalizeLabel('')).toBe('');
  });
});

describe('bucketing', () => {
  it('floors coordinates to the bucket', () => {
    expect(bucketCoordinate(149)).toBe(100);
    expect(bucketCoordinate(150)).toBe(150);
    expect(bucketCoordinate(-1)).toBe(-50);
    expect(bucketCoordinate(37, 10)).toBe(30);
  });

  it('buckets each corner independently', () => {
    expect(bucketCorners([100, 100, 50, 20])).toEqual([100, 100, 150, 100]);
    expect(bucketCorners([110, 105, 45, 12])).toEqual([100, 100, 150, 100]);
  });
});

describe('generateObjectId', () => {
  it('produces a known content address', () => {
    expect(generateRoomId('page-1', 'CLASSE 203', [100, 100, 50, 20], '203')).toBe('room_dc3c79ff583966dd');
    expect(generateDoorId('page-1', 'D12', [110, 105, 45, 12], 'D12')).toBe('door_b16dae671c636d9e');
  });

  it('is deterministic', () => {
    const first = generateObjectId('page-1', 'room', 'CLASSE', [10, 20, 30, 40], { qualifier: '203' });
    const second = generateObjectId('page-1', 'room', 'CLASSE', [10, 20, 30, 40], { qualifier: '203' });
    expect(first).toBe(second);
    expect(first).toMatch(/^room_[0-9a-f]{16}$/);
  });

  it('absorbs sub-bucket jitter', () => {
    const a = generateRoomId('page-1', 'CLASSE 203', [100, 100, 50, 20], '203');
    const b = generateRoomId('page-1', 'CLASSE 203', [110, 105, 45, 12], '203');
    expect(a).toBe(b);
  });

  it('separates boxes in different buckets', () => {
    const a = generateRoomId('page-1', 'CLASSE 203', [100, 100, 50, 20], '203');
    const b = generateRoomId('page-1', 'CLASSE 203', [160, 100, 50, 20], '203');
    expect(a).not.toBe(b);
  });

  it('hashes the normalized label', () => {
    expect(generateRoomId('page-1', 'CLASSE 203', [0, 0, 10, 10])).toBe(
      generateRoomId('page-1', ' classe   203 ', [0, 0, 10, 10])
    );
  });

  it('is scoped by page, type and qualifier', () => {
    const bbox = [100, 100, 50, 20] as const;
    const room = generateRoomId('page-1', '203', bbox, '203');
    expect(generateRoomId('page-2', '203', bbox, '203')).not.toBe(room);
    expect(generateRoomId('page-1', '203', bbox)).not.toBe(room);

    const door = generateDoorId('page-1', '203', bbox, '203');
    expect(door.startsWith('door_')).toBe(true);
    expect(door.slice(5)).not.toBe(room.slice(5));

    expect(generateScheduleTableId('page-1', 'DOOR SCHEDULE', bbox, 'door')).toMatch(/^schedule_table_[0-9a-f]{16}$/);
  });

  it('honours a custom bucket size', () => {
    const coarse = generateRoomId('page-1', 'HALL', [100, 100, 50, 20], undefined, 100);
    const shifted = generateRoomId('page-1', 'HALL', [130, 100, 50, 20], undefined, 100);
    expect(coarse).toBe(shifted);
  });
});
