/**
 * SkyFare - Chat Assistant Types
 * Types for the voice-enabled booking assistant
 */

// =============================================================================
// Rich content attached to assistant replies
// =============================================================================

export type ChatUiType =
  | 'FLIGHT_LIST'
  | 'FLIGHT_SELECTED'
  | 'SEAT_MAP'
  | 'BOARDING_PASS'
  | 'BOOKING_SUMMARY'
  | 'BOOKING_CONFIRMED'
  | 'PAYMENT_CONFIRM'
  | 'FLIGHT_COMPARISON';

export const CHAT_UI_TYPES: readonly ChatUiType[] = [
  'FLIGHT_LIST',
  'FLIGHT_SELECTED',
  'SEAT_MAP',
  'BOARDING_PASS',
  'BOOKING_SUMMARY',
  'BOOKING_CONFIRMED',
  'PAYMENT_CONFIRM',
  'FLIGHT_COMPARISON',
];

export function isChatUiType(value: unknown): value is ChatUiType {
  return typeof value === 'string' && CHAT_UI_TYPES.some((t) => t === value);
}

// =============================================================================
// Messages & State
// =============================================================================

export type VoiceLocale = 'en-US' | 'ar-SA';

export interface ChatMessage {
  id: string;
  text: string;
  isFromUser: boolean;
  timestamp: number;  // epoch ms
  uiType?: ChatUiType;
  uiData?: string;    // raw JSON payload for the card
  suggestions: string[];
  isLoading: boolean;
  isError: boolean;
}

export interface ChatUiState {
  messages: ChatMessage[];
  isLoading: boolean;
  isListening: boolean;
  isSpeaking: boolean;
  inputText: string;
  interimText: string;  // live transcription preview
  isExpanded: boolean;
  error: string | null;
  voiceError: string | null;
  currentLocale: VoiceLocale;
}

// =============================================================================
// API Request/Response Types
// =============================================================================

export interface ChatContextPayload {
  currentPnr?: string;
  currentScreen?: string;
}

export interface ChatRequest {
  sessionId: string;
  message: string;
  locale: VoiceLocale;
  context?: ChatContextPayload;
}

export interface ChatResponse {
  text: string;
  uiType?: ChatUiType;
  uiData?: string;
  suggestions: string[];
  detectedLanguage?: string;
}

// =============================================================================
// Parsed card payloads
// =============================================================================

export interface ParsedFlight {
  flightNumber: string;
  departureTime: string;
  date: string;
  price: string;
}

export interface BookingSummaryInfo {
  pnr: string;
  flightNumber: string;
  origin: string;
  destination: string;
  dateTime: string;
}

// =============================================================================
// Voice
// =============================================================================

export interface VoiceState {
  isListening: boolean;
  isSpeaking: boolean;
  interimText: string;
  error: string | null;
}

export const IDLE_VOICE_STATE: VoiceState = {
  isListening: false,
  isSpeaking: false,
  interimText: '',
  error: null,
};
