import { PhonicsErrorType } from './errors';
import { SpeechQueue } from './speechQueue';
import { FakeSynthesizer, flushPromises } from '../testing/fixtures';
import type { SpeechRequest, Synthesizer } from '../types/speech';

const say = (text: string): SpeechRequest => ({ kind: 'text', text });

describe('SpeechQueue', () => {
  let synth: FakeSynthesizer;
  let queue: SpeechQueue;

  beforeEach(() => {
    synth = new FakeSynthesizer('manual');
    queue = new SpeechQueue(synth);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('plays utterances one at a time in order', async () => {
    const first = queue.enqueue({ request: say('one') });
    const second = queue.enqueue({ request: say('two') });
    queue.enqueue({ request: say('three') });

    expect(synth.spoken).toEqual([say('one')]);
    expect(first.state).toBe('playing');
    expect(second.state).toBe('queued');
    expect(queue.pendingCount).toBe(2);

    synth.finishCurrent();
    await flushPromises();
    expect(synth.spoken).toEqual([say('one'), say('two')]);
    await expect(first.done).resolves.toEqual({ state: 'completed' });

    synth.finishCurrent();
    await flushPromises();
    synth.finishCurrent();
    await flushPromises();

    expect(synth.spoken).toEqual([say('one'), say('two'), say('three')]);
    expect(queue.isIdle).toBe(true);
  });

  it('drops a queued utterance on cancel', async () => {
    queue.enqueue({ request: say('one') });
    const second = queue.enqueue({ request: say('two') });

    queue.cancel(second);
    await expect(second.done).resolves.toEqual({ state: 'cancelled' });

    synth.finishCurrent();
    await flushPromises();

    expect(synth.spoken).toEqual([say('one')]);
    expect(synth.stopCount).toBe(0);
    expect(queue.isIdle).toBe(true);
  });

  it('stops the playing utterance before starting the next', async () => {
    const first = queue.enqueue({ request: say('one') });
    queue.enqueue({ request: say('two') });

    queue.cancel(first);

    expect(first.state).toBe('cancelled');
    expect(synth.stopCount).toBe(1);
    expect(synth.spoken).toEqual([say('one')]);

    await flushPromises();

    expect(synth.spoken).toEqual([say('one'), say('two')]);
    await expect(first.done).resolves.toEqual({ state: 'cancelled' });
  });

  it('ignores cancel after an utterance finished', async () => {
    const first = queue.enqueue({ request: say('one') });
    synth.finishCurrent();
    await flushPromises();

    queue.cancel(first);

    expect(first.state).toBe('completed');
    expect(synth.stopCount).toBe(0);
  });

  it('cancels everything and accepts new work afterwards', async () => {
    const handles = ['one', 'two', 'three'].map((text) => queue.enqueue({ request: say(text) }));

    queue.cancelAll();
    const next = queue.enqueue({ request: say('four') });

    expect(handles.map((handle) => handle.state)).toEqual(['cancelled', 'cancelled', 'cancelled']);
    expect(synth.stopCount).toBe(1);
    expect(next.state).toBe('queued');

    await flushPromises();

    expect(synth.spoken).toEqual([say('one'), say('four')]);
    expect(next.state).toBe('playing');
  });

  it('reports a failed utterance and moves on', async () => {
    const auto = new FakeSynthesizer('auto');
    auto.failWhen = (request) => request.kind === 'text' && request.text === 'bad';
    const autoQueue = new SpeechQueue(auto);

    const bad = autoQueue.enqueue({ request: say('bad') });
    const good = autoQueue.enqueue({ request: say('good') });

    const outcome = await bad.done;
    expect(outcome.state).toBe('failed');
    expect(outcome.error?.type).toBe(PhonicsErrorType.SYNTHESIS_FAILED);
    expect(outcome.error?.message).toBe('Could not speak "bad": voice crashed');
    expect(console.warn).toHaveBeenCalledWith('[speech]', '(prompt) Could not speak "bad": voice crashed');

    await expect(good.done).resolves.toEqual({ state: 'completed' });
    expect(auto.spoken).toEqual([say('bad'), say('good')]);
  });

  it('treats a synthesizer that throws as a failure', async () => {
    const broken: Synthesizer = {
      speak: () => {
        throw new Error('no audio device');
      },
      stop: () => undefined,
    };
    const brokenQueue = new SpeechQueue(broken);

    const handle = brokenQueue.enqueue({ request: { kind: 'sound', soundId: 'aaa' } });
    const outcome = await handle.done;

    expect(outcome.state).toBe('failed');
    expect(outcome.error?.message).toBe('Could not speak sound aaa: no audio device');
    expect(brokenQueue.isIdle).toBe(true);
  });

  it('calls onStart when an utterance begins playing', async () => {
    const started: string[] = [];

    queue.enqueue({ request: say('one'), onStart: () => started.push('one') });
    queue.enqueue({ request: say('two'), onStart: () => started.push('two') });

    expect(started).toEqual(['one']);

    synth.finishCurrent();
    await flushPromises();

    expect(started).toEqual(['one', 'two']);
  });

  it('never starts a cancelled utterance', async () => {
    const started: string[] = [];

    queue.enqueue({ request: say('one') });
    const second = queue.enqueue({ request: say('two'), onStart: () => started.push('two') });
    queue.cancel(second);

    synth.finishCurrent();
    await flushPromises();

    expect(started).toEqual([]);
  });

  it('does not speak an utterance cancelled by its own onStart', () => {
    const stale = queue.enqueue({ request: say('stale'), onStart: () => queue.cancelAll() });

    expect(stale.state).toBe('cancelled');
    expect(synth.spoken).toEqual([]);
    expect(synth.isSpeaking).toBe(false);
    expect(queue.isIdle).toBe(true);
  });

  it('plays what onStart enqueued after cancelling', () => {
    queue.enqueue({
      request: say('stale'),
      onStart: () => {
        queue.cancelAll();
        queue.enqueue({ request: say('fresh') });
      },
    });

    expect(synth.spoken).toEqual([say('fresh')]);
    expect(queue.pendingCount).toBe(0);
  });

  it('keeps playing when onStart throws', () => {
    const handle = queue.enqueue({
      request: say('one'),
      onStart: () => {
        throw new Error('render failed');
      },
    });

    expect(handle.state).toBe('playing');
    expect(console.warn).toHaveBeenCalledWith('[speech]', 'onStart handler failed: render failed');
  });

  it('resolves idle() once the queue drains', async () => {
    let idle = false;
    await queue.idle();

    queue.enqueue({ request: say('one') });
    const waiting = queue.idle().then(() => {
      idle = true;
    });

    await flushPromises();
    expect(idle).toBe(false);

    synth.finishCurrent();
    await waiting;
    expect(idle).toBe(true);
  });
});
