/**
 * Confirmation Page
 * PNR and trip summary once payment succeeded
 */

import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { StepIndicator } from '../components/booking';
import { useBooking } from '../context/BookingContext';
import { formatFlightTime } from '../utils/fares';
import { formatMoney } from '../utils/money';

export default function Confirmation() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const { confirmation, searchCriteria, selectedFlight, passengers, reset } = useBooking();

  if (!confirmation) return null;

  const flight = selectedFlight?.flight;
  const primary = passengers[0];
  const originName = searchCriteria?.origin.city || flight?.origin;
  const destinationName = searchCriteria?.destination.city || flight?.destination;
  const totalPaid =
    confirmation.totalPaidFormatted ||
    formatMoney(confirmation.totalPaidMinor, confirmation.currency);

  const startOver = (path: string) => {
    reset();
    navigate(path);
  };

  return (
    <div className="confirmation-page">
      <StepIndicator current="confirmation" />

      <section className="confirmation-card glass-card">
        <span className="confirmation-icon" aria-hidden="true">✓</span>
        <h1>{t('confirmation.title')}</h1>

        <div className="pnr-block">
          <span>{t('confirmation.pnr')}</span>
          <strong data-testid="pnr">{confirmation.pnr}</strong>
        </div>

        <dl className="confirmation-details">
          <div>
            <dt>{t('confirmation.status')}</dt>
            <dd>{confirmation.status}</dd>
          </div>
          {flight && (
            <>
              <div>
                <dt>{t('confirmation.flight')}</dt>
                <dd>{flight.flightNumber}</dd>
              </div>
              <div>
                <dt>{t('confirmation.route')}</dt>
                <dd>
                  {originName} → {destinationName}
                </dd>
              </div>
              <div>
                <dt>{t('confirmation.departure')}</dt>
                <dd>
                  {flight.departureTime.split('T')[0]} {formatFlightTime(flight.departureTime)}
                </dd>
              </div>
            </>
          )}
          <div>
            <dt>{t('confirmation.passengers')}</dt>
            <dd>{passengers.length}</dd>
          </div>
          {primary && (
            <div>
              <dt>{t('confirmation.primaryPassenger')}</dt>
              <dd>
                {primary.title} {primary.firstName} {primary.lastName}
              </dd>
            </div>
          )}
          <div>
            <dt>{t('confirmation.totalPaid')}</dt>
            <dd data-testid="total-paid">{totalPaid}</dd>
          </div>
        </dl>
      </section>

      <div className="confirmation-actions">
        <button className="primary-btn" onClick={() => startOver('/')}>
          {t('confirmation.newBooking')}
        </button>
        <button className="secondary-btn" onClick={() => startOver('/bookings')}>
          {t('confirmation.viewBookings')}
        </button>
      </div>
    </div>
  );
}
