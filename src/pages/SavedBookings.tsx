/**
 * Saved Bookings Page
 * Bookings kept on this device, plus lookup by PNR
 */

import { useState, type FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { ErrorBanner, LoadingSpinner } from '../components/ui';
import { fromConfirmation, useSavedBookings } from '../context/SavedBookingsContext';
import type { SavedBooking } from '../types';
import { formatFlightTime } from '../utils/fares';
import { formatMoney } from '../utils/money';

function totalPaid(booking: SavedBooking): string {
  return booking.totalPaidFormatted || formatMoney(booking.totalPaidMinor, booking.currency);
}

export default function SavedBookings() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const saved = useSavedBookings();
  const [pnr, setPnr] = useState('');

  const handleLookup = async (e: FormEvent) => {
    e.preventDefault();
    await saved.lookup(pnr);
  };

  const lookupResult = saved.lookupResult;
  const alreadySaved = lookupResult ? saved.find(lookupResult.pnr) !== undefined : false;

  return (
    <div className="bookings-page">
      <header className="page-header">
        <button className="back-btn icon-btn" onClick={() => navigate('/')} aria-label={t('common.back')}>
          ←
        </button>
        <h1>{t('bookings.title')}</h1>
      </header>

      <section className="glass-card">
        <h2>{t('bookings.lookupTitle')}</h2>
        <form className="lookup-form" onSubmit={(e) => void handleLookup(e)}>
          <input
            value={pnr}
            onChange={(e) => setPnr(e.target.value.toUpperCase().slice(0, 6))}
            placeholder={t('bookings.pnrPlaceholder')}
            aria-label={t('bookings.pnrPlaceholder')}
          />
          <button type="submit" className="primary-btn" disabled={saved.isLookingUp}>
            {t('bookings.find')}
          </button>
        </form>

        {saved.isLookingUp && <LoadingSpinner size="small" />}
        {saved.error && <ErrorBanner message={saved.error} />}

        {lookupResult && (
          <div className="lookup-result">
            <strong>{lookupResult.pnr}</strong> · {lookupResult.status}
            {!alreadySaved && (
              <button
                className="secondary-btn"
                onClick={() => saved.save(fromConfirmation(lookupResult))}
              >
                {t('bookings.save')}
              </button>
            )}
          </div>
        )}
      </section>

      <section className="saved-list">
        {saved.isLoading ? (
          <LoadingSpinner />
        ) : saved.bookings.length === 0 ? (
          <p className="empty-state">{t('bookings.empty')}</p>
        ) : (
          <>
            <ul>
              {saved.bookings.map((booking) => (
                <li key={booking.pnr} className="saved-booking glass-card">
                  <button
                    type="button"
                    className="saved-booking__summary"
                    onClick={() =>
                      saved.selected?.pnr === booking.pnr
                        ? saved.clearSelection()
                        : saved.select(booking)
                    }
                    aria-expanded={saved.selected?.pnr === booking.pnr}
                  >
                    <strong>{booking.pnr}</strong>
                    {booking.origin && (
                      <span>
                        {booking.origin} → {booking.destination}
                      </span>
                    )}
                  </button>

                  {saved.selected?.pnr === booking.pnr && (
                    <dl className="saved-booking__details">
                      {booking.flightNumber && (
                        <div>
                          <dt>{t('confirmation.flight')}</dt>
                          <dd>
                            {booking.flightNumber} · {formatFlightTime(booking.departureTime)}
                          </dd>
                        </div>
                      )}
                      {booking.primaryPassengerName && (
                        <div>
                          <dt>{t('confirmation.primaryPassenger')}</dt>
                          <dd>{booking.primaryPassengerName}</dd>
                        </div>
                      )}
                      <div>
                        <dt>{t('confirmation.status')}</dt>
                        <dd>{booking.status}</dd>
                      </div>
                      <div>
                        <dt>{t('confirmation.totalPaid')}</dt>
                        <dd>{totalPaid(booking)}</dd>
                      </div>
                    </dl>
                  )}

                  <button
                    type="button"
                    className="text-btn"
                    onClick={() => saved.remove(booking.pnr)}
                    aria-label={`${t('bookings.remove')} ${booking.pnr}`}
                  >
                    {t('bookings.remove')}
                  </button>
                </li>
              ))}
            </ul>
            <button className="text-btn danger" onClick={saved.clearAll}>
              {t('bookings.clearAll')}
            </button>
          </>
        )}
      </section>
    </div>
  );
}
