/**
 * Voice service
 * Speech-to-text and text-to-speech over the Web Speech API
 */

import { IDLE_VOICE_STATE, type VoiceLocale, type VoiceState } from '../types/chat';

// =============================================================================
// Web Speech typings (recognition is not in lib.dom)
// =============================================================================

interface SpeechAlternativeLike {
  transcript: string;
}

interface SpeechResultLike {
  readonly isFinal: boolean;
  readonly length: number;
  [index: number]: SpeechAlternativeLike;
}

interface SpeechResultListLike {
  readonly length: number;
  [index: number]: SpeechResultLike;
}

export interface SpeechRecognitionEventLike {
  resultIndex: number;
  results: SpeechResultListLike;
}

export interface SpeechRecognitionErrorEventLike {
  error: string;
}

export interface SpeechRecognitionLike {
  lang: string;
  continuous: boolean;
  interimResults: boolean;
  onstart: (() => void) | null;
  onresult: ((event: SpeechRecognitionEventLike) => void) | null;
  onerror: ((event: SpeechRecognitionErrorEventLike) => void) | null;
  onend: (() => void) | null;
  start(): void;
  stop(): void;
  abort(): void;
}

export type SpeechRecognitionConstructor = new () => SpeechRecognitionLike;

declare global {
  interface Window {
    SpeechRecognition?: SpeechRecognitionConstructor;
    webkitSpeechRecognition?: SpeechRecognitionConstructor;
  }
}

// =============================================================================
// Service contract
// =============================================================================

export type VoiceStateListener = (state: VoiceState) => void;
export type TranscriptListener = (transcript: string) => void;

export interface VoiceService {
  readonly isRecognitionAvailable: boolean;
  readonly isSynthesisAvailable: boolean;
  startListening(locale: VoiceLocale): void;
  stopListening(): void;
  speak(text: string, locale: VoiceLocale): void;
  stopSpeaking(): void;
  /** Returns an unsubscribe function */
  subscribe(listener: VoiceStateListener): () => void;
  /** Final (non-interim) transcripts only. Returns an unsubscribe function */
  onTranscript(listener: TranscriptListener): () => void;
}

function recognitionErrorMessage(code: string): string {
  switch (code) {
    case 'not-allowed':
    case 'service-not-allowed':
      return 'Microphone access was denied';
    case 'no-speech':
      return 'No speech detected. Please try again.';
    case 'audio-capture':
      return 'No microphone found';
    case 'network':
      return 'Speech recognition needs a network connection';
    default:
      return `Speech recognition error: ${code}`;
  }
}

// =============================================================================
// Web Speech implementation
// =============================================================================

export class WebVoiceService implements VoiceService {
  private state: VoiceState = IDLE_VOICE_STATE;
  private stateListeners = new Set<VoiceStateListener>();
  private transcriptListeners = new Set<TranscriptListener>();
  private recognition: SpeechRecognitionLike | null = null;

  constructor(
    private readonly Recognition: SpeechRecognitionConstructor | undefined,
    private readonly synthesis: SpeechSynthesis | undefined
  ) {}

  get isRecognitionAvailable(): boolean {
    return this.Recognition !== undefined;
  }

  get isSynthesisAvailable(): boolean {
    return this.synthesis !== undefined;
  }

  subscribe(listener: VoiceStateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onTranscript(listener: TranscriptListener): () => void {
    this.transcriptListeners.add(listener);
    return () => {
      this.transcriptListeners.delete(listener);
    };
  }

  startListening(locale: VoiceLocale): void {
    if (!this.Recognition) {
      this.update({ error: 'Speech recognition is not supported in this browser' });
      return;
    }

    this.stopSpeaking();
    this.recognition?.abort();

    const recognition = new this.Recognition();
    recognition.lang = locale;
    recognition.continuous = false;
    recognition.interimResults = true;

    // Events from an aborted session arrive after a restart; only the live one counts
    recognition.onstart = () => {
      if (this.recognition !== recognition) return;
      this.update({ isListening: true, interimText: '', error: null });
    };

    recognition.onresult = (event) => {
      if (this.recognition !== recognition) return;
      let interim = '';
      let final = '';
      for (let i = event.resultIndex; i < event.results.length; i++) {
        const result = event.results[i];
        if (result.isFinal) {
          final += result[0].transcript;
        } else {
          interim += result[0].transcript;
        }
      }

      if (final.trim()) {
        this.update({ interimText: '' });
        this.transcriptListeners.forEach((listener) => listener(final.trim()));
      } else {
        this.update({ interimText: interim });
      }
    };

    recognition.onerror = (event) => {
      if (this.recognition !== recognition || event.error === 'aborted') return;
      console.warn('Speech recognition error:', event.error);
      this.update({ isListening: false, interimText: '', error: recognitionErrorMessage(event.error) });
    };

    recognition.onend = () => {
      if (this.recognition !== recognition) return;
      this.recognition = null;
      this.update({ isListening: false, interimText: '' });
    };

    this.recognition = recognition;
    try {
      recognition.start();
    } catch (err) {
      console.warn('Failed to start speech recognition:', err);
      this.recognition = null;
      this.update({ isListening: false, error: 'Could not start voice input' });
    }
  }

  stopListening(): void {
    this.recognition?.stop();
    this.update({ isListening: false, interimText: '' });
  }

  speak(text: string, locale: VoiceLocale): void {
    if (!this.synthesis || !text.trim()) return;

    this.synthesis.cancel();
    const utterance = new SpeechSynthesisUtterance(text);
    utterance.lang = locale;
    utterance.onstart = () => this.update({ isSpeaking: true });
    utterance.onend = () => this.update({ isSpeaking: false });
    utterance.onerror = (event) => {
      console.warn('Speech synthesis error:', event.error);
      this.update({ isSpeaking: false });
    };
    this.synthesis.speak(utterance);
  }

  stopSpeaking(): void {
    if (!this.synthesis) return;
    this.synthesis.cancel();
    if (this.state.isSpeaking) {
      this.update({ isSpeaking: false });
    }
  }

  private update(partial: Partial<VoiceState>): void {
    this.state = { ...this.state, ...partial };
    this.stateListeners.forEach((listener) => listener(this.state));
  }
}

// =============================================================================
// Fallback
// =============================================================================

export class NoopVoiceService implements VoiceService {
  readonly isRecognitionAvailable = false;
  readonly isSynthesisAvailable = false;

  startListening(): void {}
  stopListening(): void {}
  speak(): void {}
  stopSpeaking(): void {}

  subscribe(_listener: VoiceStateListener): () => void {
    return () => {};
  }

  onTranscript(): () => void {
    return () => {};
  }
}

export function createVoiceService(): VoiceService {
  if (typeof window === 'undefined') return new NoopVoiceService();

  const Recognition = window.SpeechRecognition ?? window.webkitSpeechRecognition;
  const synthesis = 'speechSynthesis' in window ? window.speechSynthesis : undefined;

  if (!Recognition && !synthesis) return new NoopVoiceService();
  return new WebVoiceService(Recognition, synthesis);
}
