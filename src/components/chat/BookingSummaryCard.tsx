/**
 * Booking Summary Card
 */

import { parseBookingSummary } from '../../utils/chatPayload';

interface BookingSummaryCardProps {
  uiData?: string;
}

export default function BookingSummaryCard({ uiData }: BookingSummaryCardProps) {
  const summary = parseBookingSummary(uiData);
  if (!summary) return null;

  return (
    <div className="chat-card chat-card--booking">
      {summary.pnr && <p className="chat-booking__pnr">{summary.pnr}</p>}
      {summary.flightNumber && <p className="chat-booking__flight">{summary.flightNumber}</p>}
      {(summary.origin || summary.destination) && (
        <p className="chat-booking__route">
          {summary.origin} → {summary.destination}
        </p>
      )}
      {summary.dateTime && <p className="chat-booking__time">{summary.dateTime}</p>}
    </div>
  );
}
