/**
 * Search Page
 * Origin, destination, date and travellers; entry point of the booking flow
 */

import { useRef, type FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { PassengerCounter, StepIndicator } from '../components/booking';
import { ErrorBanner, LoadingSpinner } from '../components/ui';
import { useSearchForm } from '../hooks/useSearchForm';

export default function Search() {
  const navigate = useNavigate();
  const { t } = useTranslation();
  const form = useSearchForm();

  // Ref-based guard against double submit
  const isSubmittingRef = useRef(false);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    if (isSubmittingRef.current || !form.canSearch) return;

    isSubmittingRef.current = true;
    try {
      const found = await form.search();
      if (found) navigate('/results');
    } finally {
      isSubmittingRef.current = false;
    }
  };

  const selectByCode = (code: string, target: 'origin' | 'destination') => {
    const pool = target === 'origin' ? form.stations : form.availableDestinations;
    const station = pool.find((s) => s.code === code);
    if (!station) return;
    if (target === 'origin') form.selectOrigin(station);
    else form.selectDestination(station);
  };

  if (form.isLoading) {
    return (
      <div className="search-page">
        <LoadingSpinner message={t('search.loadingStations')} />
      </div>
    );
  }

  return (
    <div className="search-page">
      <StepIndicator current="search" />

      <header className="page-header">
        <h1>{t('search.title')}</h1>
        <p className="tagline">{t('app.tagline')}</p>
      </header>

      {form.error && (
        <ErrorBanner
          message={form.error}
          onRetry={form.stations.length === 0 ? () => void form.retry() : undefined}
          onDismiss={form.clearError}
        />
      )}

      <form className="search-form glass-card" onSubmit={(e) => void handleSubmit(e)}>
        <div className="airport-row">
          <label className="field">
            <span>{t('search.from')}</span>
            <select
              aria-label={t('search.from')}
              value={form.origin?.code ?? ''}
              onChange={(e) => selectByCode(e.target.value, 'origin')}
            >
              <option value="" disabled>
                {t('search.selectOrigin')}
              </option>
              {form.stations.map((station) => (
                <option key={station.code} value={station.code}>
                  {station.city} ({station.code})
                </option>
              ))}
            </select>
          </label>

          <button
            type="button"
            className="icon-btn swap-btn"
            onClick={form.swapAirports}
            disabled={!form.origin || !form.destination}
            aria-label={t('search.swap')}
          >
            ⇄
          </button>

          <label className="field">
            <span>{t('search.to')}</span>
            <select
              aria-label={t('search.to')}
              value={form.destination?.code ?? ''}
              onChange={(e) => selectByCode(e.target.value, 'destination')}
              disabled={!form.origin}
            >
              <option value="" disabled>
                {t('search.selectDestination')}
              </option>
              {form.availableDestinations.map((station) => (
                <option key={station.code} value={station.code}>
                  {station.city} ({station.code})
                </option>
              ))}
            </select>
          </label>
        </div>

        <label className="field">
          <span>{t('search.date')}</span>
          <input
            type="date"
            value={form.departureDate}
            onChange={(e) => form.setDepartureDate(e.target.value)}
          />
        </label>

        <fieldset className="passenger-counters">
          <legend>{t('search.passengers')}</legend>
          <PassengerCounter
            label={t('search.adults')}
            hint={t('search.adultsHint')}
            value={form.passengers.adults}
            min={1}
            onIncrement={form.incrementAdults}
            onDecrement={form.decrementAdults}
          />
          <PassengerCounter
            label={t('search.children')}
            hint={t('search.childrenHint')}
            value={form.passengers.children}
            min={0}
            onIncrement={form.incrementChildren}
            onDecrement={form.decrementChildren}
          />
          <PassengerCounter
            label={t('search.infants')}
            hint={t('search.infantsHint')}
            value={form.passengers.infants}
            min={0}
            onIncrement={form.incrementInfants}
            onDecrement={form.decrementInfants}
          />
        </fieldset>

        <button type="submit" className="primary-btn" disabled={!form.canSearch}>
          {form.isSearching ? t('search.searching') : t('search.submit')}
        </button>
      </form>

      {form.recentSearches.length > 0 && (
        <section className="recent-searches">
          <h2>{t('search.recent')}</h2>
          <ul>
            {form.recentSearches.map((entry) => (
              <li key={`${entry.origin}-${entry.destination}-${entry.departureDate}`}>
                <button
                  type="button"
                  className="recent-search"
                  onClick={() => form.applyRecentSearch(entry)}
                >
                  {entry.origin} → {entry.destination} · {entry.departureDate}
                </button>
              </li>
            ))}
          </ul>
        </section>
      )}
    </div>
  );
}
