import {describe, test, expect, vi} from 'vitest';
import {ListenerHub, annotationFromArgs} from './listener_hub';
import {LatLng} from '../geo/lat_lng';
import {ListenerCallbackError, UnsupportedShapeError} from '../util/bridge_error';

import type {ErrorEvent} from '../util/evented';

const point = {type: 'Point', coordinates: [85.3240, 27.7172]};

describe('ListenerHub', () => {
    test('delivers clicks as latitude and longitude', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        hub.on('mapClick', listener);
        hub.onMapClick([27.7172, 85.3240]);
        expect(listener).toHaveBeenCalledTimes(1);
        const event = listener.mock.calls[0][0];
        expect(event.type).toBe('mapClick');
        expect(event.latLng).toEqual(new LatLng(27.7172, 85.3240));
    });

    test('keeps long clicks on their own channel', () => {
        const hub = new ListenerHub();
        const click = vi.fn();
        const longClick = vi.fn();
        hub.on('mapClick', click);
        hub.on('mapLongClick', longClick);
        hub.onMapLongClick([1, 2]);
        expect(click).not.toHaveBeenCalled();
        expect(longClick.mock.calls[0][0].type).toBe('mapLongClick');
    });

    test('reports a payload that cannot be decoded instead of firing', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        const errors: Array<ErrorEvent> = [];
        hub.on('mapClick', listener);
        hub.on('error', e => errors.push(e));
        hub.onMapClick({lat: 1});
        expect(listener).not.toHaveBeenCalled();
        expect(errors).toHaveLength(1);
        expect(errors[0].error).toBeInstanceOf(UnsupportedShapeError);
        expect(errors[0].error.message).toBe('Expected [latitude, longitude, altitude?] but received object');
    });

    test('logs decode failures when nobody listens for errors', () => {
        const hub = new ListenerHub();
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        hub.onFpsChanged('sixty');
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toBeInstanceOf(UnsupportedShapeError);
    });

    test('fires the payload-free channels', () => {
        const hub = new ListenerHub();
        const calls: Array<string> = [];
        for (const type of ['mapRendered', 'mapLoaded', 'styleLoaded', 'cameraIdle', 'fling'] as const) {
            hub.on(type, e => calls.push(e.type));
        }
        hub.onMapRendered();
        hub.onMapLoaded();
        hub.onStyleLoaded();
        hub.onCameraIdle();
        hub.onFling();
        expect(calls).toEqual(['mapRendered', 'mapLoaded', 'styleLoaded', 'cameraIdle', 'fling']);
    });

    describe('camera moves', () => {
        test('map reason codes to names', () => {
            const hub = new ListenerHub();
            const listener = vi.fn();
            hub.on('cameraMove', listener);
            hub.onCameraMoveStarted(0);
            hub.onCameraMoveStarted(1);
            hub.onCameraMoveStarted(2);
            hub.onCameraMoveStarted(3);
            hub.onCameraMoveStarted(9);
            hub.onCameraMoveStarted();
            expect(listener.mock.calls.map(([e]) => e.reason)).toEqual([
                'unknown', 'apiGesture', 'developerAnimation', 'apiAnimation', 'unknown', undefined
            ]);
        });

        test('report their phase', () => {
            const hub = new ListenerHub();
            const listener = vi.fn();
            hub.on('cameraMove', listener);
            hub.onCameraMoveStarted(1);
            hub.onCameraMove();
            hub.onCameraMoveEnd();
            expect(listener.mock.calls.map(([e]) => e.phase)).toEqual(['start', 'move', 'end']);
        });

        test('reject a fractional reason code', () => {
            const hub = new ListenerHub();
            const listener = vi.fn();
            const errors = vi.fn();
            hub.on('cameraMove', listener);
            hub.on('error', errors);
            hub.onCameraMoveStarted(1.5);
            expect(listener).not.toHaveBeenCalled();
            expect(errors).toHaveBeenCalledTimes(1);
        });
    });

    test('delivers rotation angles', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        hub.on('rotate', listener);
        hub.onRotateStarted(5, 10, 2);
        hub.onRotate(5, 20, 10);
        hub.onRotateEnd(5, 25, 5);
        expect(listener.mock.calls.map(([e]) => [e.phase, e.angleThreshold, e.deltaSinceStart, e.deltaSinceLast])).toEqual([
            ['start', 5, 10, 2],
            ['move', 5, 20, 10],
            ['end', 5, 25, 5]
        ]);
    });

    test('delivers frame rates', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        hub.on('fpsChanged', listener);
        hub.onFpsChanged(59.5);
        expect(listener.mock.calls[0][0].fps).toBe(59.5);
    });

    test('delivers annotation clicks', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        hub.on('annotationClick', listener);
        hub.onAnnotationClick({id: 4, type: 'Circle', draggable: true, data: '{"name":"stop"}', geometry: point});
        expect(listener.mock.calls[0][0].annotation).toEqual({
            id: 4,
            type: 'circle',
            draggable: true,
            data: {name: 'stop'},
            geometry: point
        });
    });

    test('delivers annotation drags with their phase', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        const moved = {type: 'Point', coordinates: [86, 28]};
        hub.on('annotationDrag', listener);
        hub.onAnnotationDrag(4, 'symbol', point, point, 'start');
        hub.onAnnotationDrag(4, 'symbol', point, moved, 'dragging');
        hub.onAnnotationDrag(4, 'symbol', point, moved, 'finished');
        expect(listener.mock.calls.map(([e]) => e.phase)).toEqual(['start', 'move', 'end']);
        const last = listener.mock.calls[2][0];
        expect(last.annotationId).toBe(4);
        expect(last.annotationType).toBe('symbol');
        expect(last.geometry).toEqual(point);
        expect(last.updatedGeometry).toEqual(moved);
    });

    describe('listener errors', () => {
        test('do not stop other listeners and are reported on the error channel', () => {
            const hub = new ListenerHub();
            const calls: Array<string> = [];
            const errors: Array<ErrorEvent> = [];
            hub.on('mapLoaded', () => calls.push('A'));
            hub.on('mapLoaded', () => { throw new Error('listener failed'); });
            hub.on('mapLoaded', () => calls.push('C'));
            hub.on('error', e => errors.push(e));
            hub.onMapLoaded();
            expect(calls).toEqual(['A', 'C']);
            expect(errors).toHaveLength(1);
            expect(errors[0].error).toBeInstanceOf(ListenerCallbackError);
            expect(errors[0].error.message).toBe('Listener for "mapLoaded" threw: listener failed');
        });

        test('thrown by an error listener are only logged', () => {
            const hub = new ListenerHub();
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            hub.on('error', () => { throw new Error('error listener failed'); });
            hub.on('fling', () => { throw new Error('fling listener failed'); });
            hub.onFling();
            expect(error).toHaveBeenCalledTimes(1);
            expect(error.mock.calls[0][0]).toHaveProperty('message', 'Listener for "error" threw: error listener failed');
        });
    });

    test('delivers nothing after dispose', () => {
        const hub = new ListenerHub();
        const listener = vi.fn();
        hub.on('mapClick', listener);
        hub.dispose();
        hub.onMapClick([1, 2]);
        expect(listener).not.toHaveBeenCalled();
    });
});

describe('annotationFromArgs', () => {
    test('reads the minimal map', () => {
        expect(annotationFromArgs({id: 1, type: 'POLYLINE'})).toEqual({id: 1, type: 'polyline', draggable: false});
    });

    test('rejects unknown types and ids', () => {
        expect(() => annotationFromArgs({id: 1, type: 'marker'})).toThrow('Expected an annotation type but received string "marker"');
        expect(() => annotationFromArgs({id: '1', type: 'circle'})).toThrow(UnsupportedShapeError);
        expect(() => annotationFromArgs({id: 1, type: 'circle', data: [1]})).toThrow(UnsupportedShapeError);
    });
});
