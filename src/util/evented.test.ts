import {describe, test, expect, vi} from 'vitest';
import {Event, Evented} from './evented';
import {DiagnosticEvent, Diagnostics} from './diagnostics';

describe('Evented', () => {

    test('calls diagnostic listeners added with "on" for every event', () => {
        const diagnostics = new Diagnostics();
        const listener = vi.fn();
        diagnostics.on('diagnostic', listener);
        diagnostics.info('tile.finished', {tile: '0/0/0'});
        diagnostics.debug('tile.finished', {tile: '1/0/0'});
        expect(listener).toHaveBeenCalledTimes(2);
    });

    test('stops calling a listener after unsubscribing', () => {
        const diagnostics = new Diagnostics();
        const listener = vi.fn();
        const subscription = diagnostics.on('diagnostic', listener);
        diagnostics.info('tile.finished');
        subscription.unsubscribe();
        diagnostics.info('tile.finished');
        expect(listener).toHaveBeenCalledTimes(1);
        expect(diagnostics.listens('diagnostic')).toBe(false);
    });

    test('passes the firing instance as "target"', () => {
        const diagnostics = new Diagnostics();
        const listener = vi.fn();
        diagnostics.on('diagnostic', listener);
        diagnostics.warn('store.feature-indices-mismatch');
        const event: DiagnosticEvent = listener.mock.calls[0][0];
        expect(event.target).toBe(diagnostics);
        expect(event.type).toBe('diagnostic');
    });

    test('removes listeners with "off"', () => {
        const diagnostics = new Diagnostics();
        const listener = vi.fn();
        diagnostics.on('diagnostic', listener);
        diagnostics.off('diagnostic', listener);
        diagnostics.info('tile.finished');
        expect(listener).not.toHaveBeenCalled();
    });

    test('adds a listener only once', () => {
        const diagnostics = new Diagnostics();
        const order: string[] = [];
        const listenerA = vi.fn(() => { order.push('A'); });
        const listenerB = vi.fn(() => { order.push('B'); });
        diagnostics.on('diagnostic', listenerA);
        diagnostics.on('diagnostic', listenerB);
        diagnostics.on('diagnostic', listenerA);
        diagnostics.info('tile.finished');
        expect(order).toEqual(['A', 'B']);
    });

    test('lets a listener remove itself while an event is fired', () => {
        const diagnostics = new Diagnostics();
        const names: string[] = [];
        const listener = (event: Event) => {
            if (event instanceof DiagnosticEvent) names.push(event.name);
            diagnostics.off('diagnostic', listener);
        };
        const other = vi.fn();
        diagnostics.on('diagnostic', listener);
        diagnostics.on('diagnostic', other);
        diagnostics.info('first');
        diagnostics.info('second');
        expect(names).toEqual(['first']);
        expect(other).toHaveBeenCalledTimes(2);
    });

    test('does nothing when an event has no listener', () => {
        const evented = new Evented();
        const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
        expect(evented.fire(new Event('diagnostic'))).toBe(evented);
        expect(spy).not.toHaveBeenCalled();
        spy.mockRestore();
    });
});

describe('evented parents', () => {

    test('bubbles diagnostics to the parent with the original "target"', () => {
        const parent = new Diagnostics();
        const child = new Diagnostics();
        child.setEventedParent(parent);
        const listener = vi.fn();
        parent.on('diagnostic', listener);
        child.error('layer.tessellation-failed', {layer: 'roads'});

        expect(listener).toHaveBeenCalledTimes(1);
        const event: DiagnosticEvent = listener.mock.calls[0][0];
        expect(event.target).toBe(child);
        expect(event.fields).toEqual({layer: 'roads'});
    });

    test('reports parent listeners with "listens"', () => {
        const parent = new Diagnostics();
        const child = new Diagnostics();
        parent.on('diagnostic', () => {});
        child.setEventedParent(parent);
        expect(child.listens('diagnostic')).toBe(true);
    });

    test('removes parents with "setEventedParent(undefined)"', () => {
        const parent = new Diagnostics();
        const child = new Diagnostics();
        const listener = vi.fn();
        parent.on('diagnostic', listener);
        child.setEventedParent(parent);
        child.setEventedParent(undefined);
        child.info('tile.finished');
        expect(listener).not.toHaveBeenCalled();
        expect(child.listens('diagnostic')).toBe(false);
    });
});
