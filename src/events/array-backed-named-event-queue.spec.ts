import ArrayBackedNamedEventQueue from './array-backed-named-event-queue';
import QueueItem from './queue-item';

describe('ArrayBackedNamedEventQueue', () => {
  it('should initialize with the correct name and empty queue', () => {
    const queue = new ArrayBackedNamedEventQueue<QueueItem>('testQueue');
    expect(queue.name).toBe('testQueue');
    expect(queue.length).toBe(0);
    expect(queue.isEmpty()).toBe(true);
    expect(queue.shift()).toBeUndefined();
  });

  it('should hand items out in insertion order', () => {
    const queue = new ArrayBackedNamedEventQueue<QueueItem>('testQueue');
    const first = { destination: 'https://a.example.com', payload: '{"n":1}' };
    const second = { destination: 'https://b.example.com', payload: '' };
    const third = { destination: 'https://a.example.com', payload: '{"n":1}' };
    queue.push(first, second);
    queue.push(third);

    expect([...queue]).toEqual([first, second, third]);
    expect(queue.shift()).toBe(first);
    expect(queue.shift()).toBe(second);
    expect(queue.length).toBe(1);
    expect(queue.shift()).toBe(third);
    expect(queue.isEmpty()).toBe(true);
  });

  it('should keep every pushed item without a size limit', () => {
    const queue = new ArrayBackedNamedEventQueue<string>('testQueue');
    for (let i = 0; i < 5_000; i++) {
      queue.push(`event${i}`);
    }
    expect(queue.length).toBe(5_000);
  });
});
