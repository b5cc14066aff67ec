/**
 * Voice Service Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createVoiceService,
  NoopVoiceService,
  WebVoiceService,
  type SpeechRecognitionEventLike,
  type SpeechRecognitionLike,
} from './voice';
import type { VoiceState } from '../types/chat';

// =============================================================================
// Fakes
// =============================================================================

class FakeRecognition implements SpeechRecognitionLike {
  static instances: FakeRecognition[] = [];
  static failNextStart = false;

  lang = '';
  continuous = true;
  interimResults = false;
  onstart: (() => void) | null = null;
  onresult: ((event: SpeechRecognitionEventLike) => void) | null = null;
  onerror: ((event: { error: string }) => void) | null = null;
  onend: (() => void) | null = null;
  start = vi.fn(() => {
    if (FakeRecognition.failNextStart) {
      FakeRecognition.failNextStart = false;
      throw new Error('busy');
    }
  });
  stop = vi.fn();
  abort = vi.fn();

  constructor() {
    FakeRecognition.instances.push(this);
  }
}

class FakeSynthesis implements SpeechSynthesis {
  onvoiceschanged = null;
  paused = false;
  pending = false;
  speaking = false;
  spoken: SpeechSynthesisUtterance[] = [];

  cancel = vi.fn();
  speak = vi.fn((utterance: SpeechSynthesisUtterance) => {
    this.spoken.push(utterance);
  });

  getVoices(): SpeechSynthesisVoice[] {
    return [];
  }
  pause(): void {}
  resume(): void {}
  addEventListener(): void {}
  removeEventListener(): void {}
  dispatchEvent(): boolean {
    return false;
  }
}

class FakeUtterance {
  lang = '';
  onstart: (() => void) | null = null;
  onend: (() => void) | null = null;
  onerror: (() => void) | null = null;

  constructor(public text: string) {}
}

function speechEvent(...items: Array<{ transcript: string; isFinal: boolean }>): SpeechRecognitionEventLike {
  return {
    resultIndex: 0,
    results: items.map(({ transcript, isFinal }) => Object.assign([{ transcript }], { isFinal })),
  };
}

function lastRecognition(): FakeRecognition {
  const recognition = FakeRecognition.instances.at(-1);
  if (!recognition) throw new Error('No recognition was created');
  return recognition;
}

function track(service: WebVoiceService): VoiceState[] {
  const states: VoiceState[] = [];
  service.subscribe((state) => states.push(state));
  return states;
}

// =============================================================================
// Tests
// =============================================================================

describe('WebVoiceService', () => {
  beforeEach(() => {
    FakeRecognition.instances = [];
    FakeRecognition.failNextStart = false;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports what the browser supports', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);

    expect(service.isRecognitionAvailable).toBe(true);
    expect(service.isSynthesisAvailable).toBe(false);
  });

  it('reports an error when recognition is unsupported', () => {
    const service = new WebVoiceService(undefined, new FakeSynthesis());
    const states = track(service);

    service.startListening('en-US');

    expect(states.at(-1)?.error).toBe('Speech recognition is not supported in this browser');
  });

  it('configures and starts recognition in the chosen locale', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);

    service.startListening('ar-SA');
    const recognition = lastRecognition();
    recognition.onstart?.();

    expect(recognition.lang).toBe('ar-SA');
    expect(recognition.continuous).toBe(false);
    expect(recognition.interimResults).toBe(true);
    expect(recognition.start).toHaveBeenCalledTimes(1);
    expect(states.at(-1)).toEqual({ isListening: true, isSpeaking: false, interimText: '', error: null });
  });

  it('shows interim text and emits trimmed final transcripts', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);
    const transcripts: string[] = [];
    service.onTranscript((text) => transcripts.push(text));

    service.startListening('en-US');
    const recognition = lastRecognition();

    recognition.onresult?.(speechEvent({ transcript: 'book a', isFinal: false }));
    expect(states.at(-1)?.interimText).toBe('book a');
    expect(transcripts).toEqual([]);

    recognition.onresult?.(speechEvent({ transcript: ' book a flight ', isFinal: true }));
    expect(transcripts).toEqual(['book a flight']);
    expect(states.at(-1)?.interimText).toBe('');
  });

  it('maps recognition errors and ignores aborts', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);

    service.startListening('en-US');
    const recognition = lastRecognition();

    recognition.onerror?.({ error: 'aborted' });
    expect(states).toEqual([]);

    recognition.onerror?.({ error: 'not-allowed' });
    expect(states.at(-1)?.error).toBe('Microphone access was denied');
    expect(states.at(-1)?.isListening).toBe(false);

    recognition.onerror?.({ error: 'bad-grammar' });
    expect(states.at(-1)?.error).toBe('Speech recognition error: bad-grammar');
    warnSpy.mockRestore();
  });

  it('reports a failure to start', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    FakeRecognition.failNextStart = true;
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);

    service.startListening('en-US');

    expect(states.at(-1)?.error).toBe('Could not start voice input');
    warnSpy.mockRestore();
  });

  it('aborts the previous session when listening starts again', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);

    service.startListening('en-US');
    const first = lastRecognition();
    service.startListening('en-US');

    expect(first.abort).toHaveBeenCalledTimes(1);
    expect(FakeRecognition.instances).toHaveLength(2);
  });

  it('ignores events from a session replaced by a restart', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);
    const transcripts: string[] = [];
    service.onTranscript((text) => transcripts.push(text));

    service.startListening('en-US');
    const first = lastRecognition();
    first.onstart?.();
    service.startListening('en-US');
    const second = lastRecognition();
    second.onstart?.();

    first.onresult?.(speechEvent({ transcript: 'old words', isFinal: true }));
    first.onerror?.({ error: 'network' });
    first.onend?.();

    expect(transcripts).toEqual([]);
    expect(states.at(-1)).toEqual({ isListening: true, isSpeaking: false, interimText: '', error: null });

    service.stopListening();
    expect(second.stop).toHaveBeenCalledTimes(1);
  });

  it('stops listening on request', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);
    const states = track(service);

    service.startListening('en-US');
    const recognition = lastRecognition();
    service.stopListening();

    expect(recognition.stop).toHaveBeenCalledTimes(1);
    expect(states.at(-1)?.isListening).toBe(false);
  });

  it('stops notifying after unsubscribe', () => {
    const service = new WebVoiceService(FakeRecognition, undefined);
    const listener = vi.fn();
    const unsubscribe = service.subscribe(listener);

    unsubscribe();
    service.stopListening();

    expect(listener).not.toHaveBeenCalled();
  });

  it('speaks in the chosen locale after cancelling current speech', () => {
    vi.stubGlobal('SpeechSynthesisUtterance', FakeUtterance);
    const synthesis = new FakeSynthesis();
    const service = new WebVoiceService(undefined, synthesis);

    service.speak('Hello', 'en-US');

    expect(synthesis.cancel).toHaveBeenCalledTimes(1);
    expect(synthesis.spoken).toHaveLength(1);
    expect(synthesis.spoken[0].text).toBe('Hello');
    expect(synthesis.spoken[0].lang).toBe('en-US');
  });

  it('does not speak blank text', () => {
    const synthesis = new FakeSynthesis();
    const service = new WebVoiceService(undefined, synthesis);

    service.speak('   ', 'en-US');

    expect(synthesis.speak).not.toHaveBeenCalled();
  });
});

describe('NoopVoiceService', () => {
  it('supports nothing and never notifies', () => {
    const service = new NoopVoiceService();
    const listener = vi.fn();

    service.subscribe(listener)();
    service.startListening();
    service.speak();

    expect(service.isRecognitionAvailable).toBe(false);
    expect(service.isSynthesisAvailable).toBe(false);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('createVoiceService', () => {
  it('falls back to the no-op service without browser speech support', () => {
    expect(createVoiceService()).toBeInstanceOf(NoopVoiceService);
  });
});
