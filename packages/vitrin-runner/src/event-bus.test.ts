import { describe, expect, it } from 'vitest';
import { EventBus, type WorkItemResult, type WorkerInfo } from './event-bus.js';

const worker: WorkerInfo = { id: 'chrome-0', browser: 'chrome', index: 0 };

const passed: WorkItemResult = {
	item: { id: 'search.e2e.ts#0', title: 'laptop', file: 'search.e2e.ts', suitePath: ['Search'] },
	worker,
	status: 'passed',
	duration: 120,
};

describe('EventBus', () => {
	it('should deliver payloads to listeners in registration order', () => {
		const bus = new EventBus();
		const seen: string[] = [];
		bus.on('item:pass', ({ item }) => seen.push(`first ${item.title}`));
		bus.on('item:pass', ({ duration }) => seen.push(`second ${duration}`));

		bus.emit('item:pass', passed);
		expect(seen).toEqual(['first laptop', 'second 120']);
	});

	it('should stop calling a listener after unsubscribing', () => {
		const bus = new EventBus();
		let calls = 0;
		const off = bus.on('worker:ready', () => calls++);

		bus.emit('worker:ready', worker);
		off();
		bus.emit('worker:ready', worker);
		expect(calls).toBe(1);
		expect(bus.listenerCount('worker:ready')).toBe(0);
	});

	it('should call a once listener a single time', () => {
		const bus = new EventBus();
		const ids: string[] = [];
		bus.once('worker:spawn', ({ id }) => ids.push(id));

		bus.emit('worker:spawn', worker);
		bus.emit('worker:spawn', { ...worker, id: 'chrome-1', index: 1 });
		expect(ids).toEqual(['chrome-0']);
	});

	it('should keep emitting when a listener throws', () => {
		const failures: string[] = [];
		const bus = new EventBus((event, error) => failures.push(`${event}: ${String(error)}`));
		let reached = false;
		bus.on('worker:done', () => {
			throw new Error('reporter broke');
		});
		bus.on('worker:done', () => {
			reached = true;
		});

		bus.emit('worker:done', worker);
		expect(reached).toBe(true);
		expect(failures).toEqual(['worker:done: Error: reporter broke']);
	});

	it('should remove listeners for one event or all of them', () => {
		const bus = new EventBus();
		bus.on('item:pass', () => {});
		bus.on('item:fail', () => {});
		bus.on('item:fail', () => {});
		expect(bus.listenerCount()).toBe(3);

		bus.off('item:fail');
		expect(bus.listenerCount()).toBe(1);
		bus.off();
		expect(bus.listenerCount()).toBe(0);
	});

	it('should record event names while history is on', () => {
		const bus = new EventBus();
		bus.emit('worker:spawn', worker);
		bus.enableHistory();
		bus.emit('worker:ready', worker);
		bus.emit('item:pass', passed);
		expect(bus.getHistory()).toEqual(['worker:ready', 'item:pass']);

		bus.clearHistory();
		expect(bus.getHistory()).toEqual([]);
	});
});
