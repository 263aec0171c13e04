// test/eventEmitter.test.ts

import EventEmitter from '../src/EventEmitter.js';

type TestEvents = {
    saved: [string, number];
    cleared: [];
};

describe('EventEmitter', () => {
    it('calls listeners in registration order with the emitted arguments', () => {
        const emitter = new EventEmitter<TestEvents>();
        const calls: string[] = [];
        emitter.on('saved', (name, size) => calls.push(`a:${name}:${size}`));
        emitter.on('saved', (name, size) => calls.push(`b:${name}:${size}`));

        emitter.emit('saved', 'plan.dwg', 3);

        expect(calls).toEqual(['a:plan.dwg:3', 'b:plan.dwg:3']);
        expect(emitter.listenerCount('saved')).toBe(2);
    });

    it('removes one listener or all of them', () => {
        const emitter = new EventEmitter<TestEvents>();
        const first = jest.fn();
        const second = jest.fn();
        emitter.on('cleared', first);
        emitter.on('cleared', second);

        emitter.off('cleared', first);
        emitter.emit('cleared');
        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);

        emitter.off('cleared');
        emitter.emit('cleared');
        expect(second).toHaveBeenCalledTimes(1);
        expect(emitter.listenerCount('cleared')).toBe(0);
    });

    it('ignores events nobody listens to', () => {
        const emitter = new EventEmitter<TestEvents>();
        expect(() => emitter.emit('cleared')).not.toThrow();
    });
});
