import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger } from '../logger';

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });
    test('messages below the level are dropped', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const log = new Logger('test', 'warn');
        log.debug('hidden');
        log.warn('shown');
        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });
    test('messages carry the logger name and level', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        new Logger('shapes').error('bad radii', 42);
        const [message, extra] = error.mock.calls[0];
        expect(message).toMatch(/^\[.+\] \[shapes\] \[ERROR\] bad radii$/);
        expect(extra).toBe(42);
    });
    test('none silences everything', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const log = new Logger('test');
        log.setLevel('none');
        log.error('nope');
        expect(log.getLevel()).toBe('none');
        expect(error).not.toHaveBeenCalled();
    });
    test('a child logger is named after its parent and scope', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const child = new Logger('quadrant').child('geometry');
        child.warn('radii overflow');
        expect(child.getName()).toBe('quadrant:geometry');
        expect(warn.mock.calls[0][0]).toMatch(/^\[.+\] \[quadrant:geometry\] \[WARN\] radii overflow$/);
    });
    test('a child follows its parent level until given its own', () => {
        const parent = new Logger('quadrant', 'warn');
        const child = parent.child('input');
        expect(child.getLevel()).toBe('warn');
        parent.setLevel('error');
        expect(child.getLevel()).toBe('error');
        child.setLevel('debug');
        expect(child.getLevel()).toBe('debug');
        expect(parent.getLevel()).toBe('error');
        child.resetLevel();
        expect(child.getLevel()).toBe('error');
    });
    test('silencing the parent silences its children', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const parent = new Logger('quadrant');
        parent.setLevel('none');
        parent.child('geometry').error('nope');
        expect(error).not.toHaveBeenCalled();
    });
    test('dir logs a header line at debug level, then the object', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const dir = vi.spyOn(console, 'dir').mockImplementation(() => {});
        const log = new Logger('test', 'debug');
        log.dir({ x: 1 });
        expect(debug.mock.calls[0][0]).toMatch(/^\[.+\] \[test\] \[DEBUG\] See object below$/);
        expect(dir).toHaveBeenCalledWith({ x: 1 });
    });
});
