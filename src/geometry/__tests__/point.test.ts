/**
 * Unit tests for point construction
 */

import { describe, it, expect } from 'vitest';
import { makePoint } from '../point.js';
import { InvalidCoordinateError } from '../../types/index.js';

describe('makePoint', () => {
    it('should put longitude first and latitude second', () => {
        const point = makePoint(-74.456, 45.543);

        expect(point).toEqual({
            type: 'Point',
            srid: 4326,
            coordinates: [-74.456, 45.543]
        });
    });

    it('should accept the range boundaries', () => {
        expect(makePoint(180, 90).coordinates).toEqual([180, 90]);
        expect(makePoint(-180, -90).coordinates).toEqual([-180, -90]);
    });

    it('should reject a latitude outside [-90, 90]', () => {
        expect(() => makePoint(10, 90.5)).toThrow(InvalidCoordinateError);
        expect(() => makePoint(10, 90.5)).toThrow('latitude 90.5 is outside [-90, 90]');
    });

    it('should reject a longitude outside [-180, 180]', () => {
        expect(() => makePoint(-180.001, 0)).toThrow('longitude -180.001 is outside [-180, 180]');
    });

    it('should reject NaN and infinities', () => {
        expect(() => makePoint(Number.NaN, 0)).toThrow('longitude must be a finite number');
        expect(() => makePoint(0, Number.POSITIVE_INFINITY)).toThrow('latitude must be a finite number');
    });

    it('should carry the INVALID_COORDINATE code', () => {
        try {
            makePoint(0, -91);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidCoordinateError);
            expect((error as InvalidCoordinateError).code).toBe('INVALID_COORDINATE');
            expect((error as InvalidCoordinateError).details).toEqual({ latitude: -91 });
        }
    });
});
