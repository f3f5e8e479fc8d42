import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SHRINK_WRAP_RATIO, loadGeometryMetrics, normalizeGeometry } from '../src/data/geometry';
import { GeometryFileError, InvalidGeometryError } from '../src/engine/errors';

const FIXTURES = path.join(__dirname, 'fixtures');

const readFixture = (filename: string) => fs.readFileSync(path.join(FIXTURES, filename), 'utf-8');

describe('Geometry Metrics Files', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cnc-geometry-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('should load a millimetre document and derive the shrink-wrap volume', () => {
    const { name, metrics } = loadGeometryMetrics(path.join(FIXTURES, 'bracket.json'));

    expect(name).toBe('suspension-bracket');
    expect(metrics.length).toBe(120.5);
    expect(metrics.volume).toBe(258700);
    expect(metrics.shrinkWrapVolume).toBeCloseTo(340000 * SHRINK_WRAP_RATIO, 6);
    expect(metrics.faceCount).toBe(2400);
  });

  test('should scale a document measured in metres', () => {
    const { name, metrics } = loadGeometryMetrics(path.join(FIXTURES, 'bracket-meters.json'));

    expect(name).toBe('bracket-meters');
    expect(metrics.length).toBeCloseTo(120.5, 6);
    expect(metrics.height).toBeCloseTo(25.8, 6);
    expect(metrics.volume).toBeCloseTo(258700, 3);
    expect(metrics.surfaceArea).toBeCloseTo(38500, 3);
    expect(metrics.shrinkWrapVolume).toBeCloseTo(272000, 3);
    expect(metrics.edgeCount).toBe(3600);
  });

  test('normalizeGeometry should keep an explicit shrink-wrap volume', () => {
    const metrics = normalizeGeometry({
      units: 'mm',
      length: 10,
      width: 10,
      height: 10,
      volume: 500,
      surfaceArea: 600,
      convexHullVolume: 1000,
      shrinkWrapVolume: 700,
      faceCount: 12,
      edgeCount: 18
    });
    expect(metrics.shrinkWrapVolume).toBe(700);
  });

  test('should raise GeometryFileError for a missing file', () => {
    expect(() => loadGeometryMetrics(path.join(tmpDir, 'missing.json'))).toThrow(GeometryFileError);
  });

  test('should raise GeometryFileError for malformed JSON', () => {
    const file = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(file, '{ "length": 1', 'utf-8');
    expect(() => loadGeometryMetrics(file)).toThrow(GeometryFileError);
  });

  test('should raise GeometryFileError for unsupported units', () => {
    const file = path.join(tmpDir, 'inches.json');
    fs.writeFileSync(file, readFixture('bracket.json').replace('{', '{ "units": "in",'), 'utf-8');
    expect(() => loadGeometryMetrics(file)).toThrow(GeometryFileError);
  });

  test('should raise InvalidGeometryError for non-positive metrics', () => {
    const file = path.join(tmpDir, 'flat.json');
    fs.writeFileSync(file, readFixture('bracket.json').replace('"height": 25.8', '"height": 0'), 'utf-8');

    try {
      loadGeometryMetrics(file);
      throw new Error('expected invalid geometry');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGeometryError);
      if (error instanceof InvalidGeometryError) {
        expect(error.violations).toEqual(['height must be greater than 0']);
      }
    }
  });
});
