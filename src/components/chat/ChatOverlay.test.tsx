/**
 * ChatOverlay Component Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { act, render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { MemoryRouter } from 'react-router-dom';
import { ChatOverlay, screenFromPath } from './ChatOverlay';
import { BookingProvider } from '../../context/BookingContext';
import { ChatProvider } from '../../context/ChatContext';
import { chatApi } from '../../api';
import type { TranscriptListener, VoiceService, VoiceStateListener } from '../../services/voice';
import { IDLE_VOICE_STATE, type VoiceState } from '../../types/chat';

vi.mock('../../api', () => ({
  chatApi: {
    sendMessage: vi.fn(),
    clearSession: vi.fn(),
  },
}));

class FakeVoiceService implements VoiceService {
  isRecognitionAvailable: boolean;
  isSynthesisAvailable = true;
  startListening = vi.fn();
  stopListening = vi.fn();
  speak = vi.fn();
  stopSpeaking = vi.fn();
  private stateListeners: VoiceStateListener[] = [];
  private transcriptListeners: TranscriptListener[] = [];

  constructor(recognition = true) {
    this.isRecognitionAvailable = recognition;
  }

  subscribe(listener: VoiceStateListener) {
    this.stateListeners.push(listener);
    return () => {
      this.stateListeners = this.stateListeners.filter((l) => l !== listener);
    };
  }

  onTranscript(listener: TranscriptListener) {
    this.transcriptListeners.push(listener);
    return () => {
      this.transcriptListeners = this.transcriptListeners.filter((l) => l !== listener);
    };
  }

  emitState(state: Partial<VoiceState>) {
    this.stateListeners.forEach((l) => l({ ...IDLE_VOICE_STATE, ...state }));
  }

  emitTranscript(text: string) {
    this.transcriptListeners.forEach((l) => l(text));
  }
}

function renderOverlay(voice = new FakeVoiceService(), path = '/') {
  render(
    <MemoryRouter initialEntries={[path]}>
      <BookingProvider>
        <ChatProvider voiceService={voice}>
          <ChatOverlay />
        </ChatProvider>
      </BookingProvider>
    </MemoryRouter>
  );
  return voice;
}

async function openChat(user: ReturnType<typeof userEvent.setup>) {
  await user.click(screen.getByLabelText('Open chat assistant'));
}

describe('screenFromPath', () => {
  it('uses the first path segment', () => {
    expect(screenFromPath('/payment')).toBe('payment');
    expect(screenFromPath('/bookings/ABC123')).toBe('bookings');
  });

  it('treats the root as the search screen', () => {
    expect(screenFromPath('/')).toBe('search');
  });
});

describe('ChatOverlay', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(chatApi.clearSession).mockResolvedValue(undefined);
  });

  describe('toggle behavior', () => {
    it('should render closed by default', () => {
      renderOverlay();

      expect(screen.getByLabelText('Open chat assistant')).toBeInTheDocument();
      expect(screen.queryByRole('dialog')).not.toBeInTheDocument();
    });

    it('should open the panel with a welcome message', async () => {
      const user = userEvent.setup();
      renderOverlay();

      await openChat(user);

      expect(screen.getByRole('dialog')).toBeInTheDocument();
      expect(screen.getByText('Booking Assistant')).toBeInTheDocument();
      expect(screen.getByText('Hi! Ask me to find flights or check a booking.')).toBeInTheDocument();
    });

    it('should close the panel from the toggle', async () => {
      const user = userEvent.setup();
      renderOverlay();

      await openChat(user);
      await user.click(screen.getByLabelText('Close chat'));

      expect(screen.queryByRole('dialog')).not.toBeInTheDocument();
    });
  });

  describe('messaging', () => {
    it('sends the typed message with the current screen as context', async () => {
      const user = userEvent.setup();
      vi.mocked(chatApi.sendMessage).mockResolvedValue({
        text: 'Here are flights to Jeddah',
        suggestions: ['Show cheapest'],
      });
      const voice = renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), 'Flights to Jeddah');
      await user.click(screen.getByLabelText('Send message'));

      expect(chatApi.sendMessage).toHaveBeenCalledWith({
        sessionId: expect.any(String),
        message: 'Flights to Jeddah',
        locale: 'en-US',
        context: { currentScreen: 'search' },
      });
      expect(await screen.findByText('Here are flights to Jeddah')).toBeInTheDocument();
      expect(screen.getByText('Flights to Jeddah')).toBeInTheDocument();
      expect(screen.getByRole('button', { name: 'Show cheapest' })).toBeInTheDocument();
      expect(voice.speak).toHaveBeenCalledWith('Here are flights to Jeddah', 'en-US');
    });

    it('sends a suggestion when its chip is tapped', async () => {
      const user = userEvent.setup();
      vi.mocked(chatApi.sendMessage)
        .mockResolvedValueOnce({ text: 'Where to?', suggestions: ['Riyadh to Jeddah'] })
        .mockResolvedValueOnce({ text: 'Searching', suggestions: [] });
      renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), 'Hello');
      await user.click(screen.getByLabelText('Send message'));
      await user.click(await screen.findByRole('button', { name: 'Riyadh to Jeddah' }));

      expect(chatApi.sendMessage).toHaveBeenLastCalledWith(
        expect.objectContaining({ message: 'Riyadh to Jeddah' })
      );
    });

    it('renders flight cards and asks to select a tapped flight', async () => {
      const user = userEvent.setup();
      vi.mocked(chatApi.sendMessage)
        .mockResolvedValueOnce({
          text: 'I found 1 flight',
          uiType: 'FLIGHT_LIST',
          uiData: JSON.stringify({
            date: '2025-12-10',
            flights: [{ flightNumber: 'FA101', departureTime: '09:00', lowestPrice: 450, currency: 'SAR' }],
          }),
          suggestions: [],
        })
        .mockResolvedValueOnce({ text: 'Selected', suggestions: [] });
      renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), 'Flights tomorrow');
      await user.click(screen.getByLabelText('Send message'));

      expect(await screen.findByText('FA101')).toBeInTheDocument();
      expect(screen.getByText('SAR 450')).toBeInTheDocument();

      await user.click(screen.getByText('FA101'));

      expect(chatApi.sendMessage).toHaveBeenLastCalledWith(
        expect.objectContaining({ message: 'Select flight FA101' })
      );
    });

    it('shows an error bubble and alert when the assistant is unreachable', async () => {
      const user = userEvent.setup();
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.mocked(chatApi.sendMessage).mockRejectedValue(new Error('boom'));
      renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), 'Hello');
      await user.click(screen.getByLabelText('Send message'));

      expect(await screen.findByRole('alert')).toHaveTextContent(
        'An unexpected error occurred. Please try again.'
      );
      expect(screen.getByText(/Sorry, an error occurred/)).toBeInTheDocument();
      warnSpy.mockRestore();
    });

    it('clears the conversation', async () => {
      const user = userEvent.setup();
      vi.mocked(chatApi.sendMessage).mockResolvedValue({ text: 'Hi there', suggestions: [] });
      renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), 'Hello');
      await user.click(screen.getByLabelText('Send message'));
      await screen.findByText('Hi there');

      await user.click(screen.getByLabelText('Clear chat history'));

      await waitFor(() => {
        expect(screen.queryByText('Hi there')).not.toBeInTheDocument();
      });
      expect(chatApi.clearSession).toHaveBeenCalledTimes(1);
      expect(screen.getByText('Hi! Ask me to find flights or check a booking.')).toBeInTheDocument();
    });

    it('counts the remaining characters', async () => {
      const user = userEvent.setup();
      renderOverlay();

      await openChat(user);
      expect(screen.getByText('500')).toBeInTheDocument();

      await user.type(screen.getByLabelText('Type a message...'), 'hello');
      expect(screen.getByText('495')).toBeInTheDocument();
    });

    it('disables send for blank input', async () => {
      const user = userEvent.setup();
      renderOverlay();

      await openChat(user);
      await user.type(screen.getByLabelText('Type a message...'), '   ');

      expect(screen.getByLabelText('Send message')).toBeDisabled();
    });
  });

  describe('voice input', () => {
    it('hides the microphone when recognition is unavailable', async () => {
      const user = userEvent.setup();
      renderOverlay(new FakeVoiceService(false));

      await openChat(user);

      expect(screen.queryByLabelText('Start voice input')).not.toBeInTheDocument();
    });

    it('starts listening in the current locale', async () => {
      const user = userEvent.setup();
      const voice = renderOverlay();

      await openChat(user);
      await user.click(screen.getByLabelText('Start voice input'));

      expect(voice.stopSpeaking).toHaveBeenCalled();
      expect(voice.startListening).toHaveBeenCalledWith('en-US');
    });

    it('shows live transcription while listening', async () => {
      const user = userEvent.setup();
      const voice = renderOverlay();

      await openChat(user);
      act(() => {
        voice.emitState({ isListening: true, interimText: 'flights to dam' });
      });

      expect(screen.getByText('flights to dam')).toBeInTheDocument();
      expect(screen.getByPlaceholderText('Listening...')).toBeInTheDocument();
      expect(screen.getByLabelText('Stop voice input')).toBeInTheDocument();
    });

    it('sends a final transcript as a message', async () => {
      const user = userEvent.setup();
      vi.mocked(chatApi.sendMessage).mockResolvedValue({ text: 'Okay', suggestions: [] });
      const voice = renderOverlay();

      await openChat(user);
      act(() => {
        voice.emitTranscript('Book a flight to Dammam');
      });

      await waitFor(() => {
        expect(chatApi.sendMessage).toHaveBeenCalledWith(
          expect.objectContaining({ message: 'Book a flight to Dammam', locale: 'en-US' })
        );
      });
      expect(await screen.findByText('Okay')).toBeInTheDocument();
    });

    it('shows voice errors', async () => {
      const user = userEvent.setup();
      const voice = renderOverlay();

      await openChat(user);
      act(() => {
        voice.emitState({ error: 'Microphone access was denied' });
      });

      expect(screen.getByRole('alert')).toHaveTextContent('Microphone access was denied');
    });
  });
});
