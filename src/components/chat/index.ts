export { ChatOverlay } from './ChatOverlay';
export { default as SuggestionChips } from './SuggestionChips';
export { default as FlightListCard } from './FlightListCard';
export { default as BookingSummaryCard } from './BookingSummaryCard';
