import assert from 'node:assert/strict';
import test from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { EventHub } from './event-hub.js';
import { SSE_KEEPALIVE_FRAME, formatSseData, pumpEventStream, type EventStreamSink } from './sse.js';

class RecordingSink implements EventStreamSink {
  readonly frames: string[] = [];
  destroyed = false;
  writableEnded = false;

  write(frame: string): boolean {
    this.frames.push(frame);
    return true;
  }

  end(): void {
    this.writableEnded = true;
  }
}

void test('data frames carry one JSON event terminated by a blank line', () => {
  assert.equal(
    formatSseData({ type: 'results_changed', version: 3 }),
    'data: {"type":"results_changed","version":3}\n\n'
  );
});

void test('pump writes the greeting, then published events, and ends when the subscriber closes', async () => {
  const hub = new EventHub();
  const subscriber = hub.subscribe();
  const sink = new RecordingSink();

  const pumping = pumpEventStream(subscriber, sink, { type: 'connected', version: 4 }, 1_000);
  hub.publish({ type: 'results_changed', version: 5 });
  await delay(5);
  subscriber.close();
  await pumping;

  assert.deepEqual(sink.frames, [
    'data: {"type":"connected","version":4}\n\n',
    'data: {"type":"results_changed","version":5}\n\n'
  ]);
  assert.equal(sink.writableEnded, true);
  assert.equal(hub.size, 0);
});

void test('pump writes keepalive comments while idle', async () => {
  const hub = new EventHub();
  const subscriber = hub.subscribe();
  const sink = new RecordingSink();

  const pumping = pumpEventStream(subscriber, sink, { type: 'connected', version: 0 }, 10);
  await delay(60);
  subscriber.close();
  await pumping;

  assert.equal(sink.frames[0], 'data: {"type":"connected","version":0}\n\n');
  const rest = sink.frames.slice(1);
  assert.ok(rest.length >= 1);
  assert.ok(rest.every((frame) => frame === SSE_KEEPALIVE_FRAME));
});

void test('a destroyed response stops the pump and releases the subscriber', async () => {
  const hub = new EventHub();
  const subscriber = hub.subscribe();
  const sink = new RecordingSink();

  const pumping = pumpEventStream(subscriber, sink, { type: 'connected', version: 1 }, 1_000);
  sink.destroyed = true;
  hub.publish({ type: 'results_changed', version: 2 });
  await pumping;

  assert.equal(sink.frames.length, 1);
  assert.equal(subscriber.closed, true);
  assert.equal(hub.size, 0);
  assert.equal(sink.writableEnded, true);
});
