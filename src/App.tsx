/**
 * SkyFare Main App Component
 * Routes: Search -> Results -> Passengers -> Ancillaries -> Payment -> Confirmation
 * The chat assistant overlays every screen
 */

import { NavLink, Route, Routes } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { BookingProvider } from './context/BookingContext';
import { SavedBookingsProvider } from './context/SavedBookingsContext';
import { ChatProvider } from './context/ChatContext';
import { RequireStep } from './components/booking';
import { ChatOverlay } from './components/chat';
import Search from './pages/Search';
import Results from './pages/Results';
import Passengers from './pages/Passengers';
import Ancillaries from './pages/Ancillaries';
import Payment from './pages/Payment';
import Confirmation from './pages/Confirmation';
import SavedBookings from './pages/SavedBookings';
import Settings from './pages/Settings';
import NotFound from './pages/NotFound';

function AppNav() {
  const { t } = useTranslation();

  return (
    <nav className="app-nav">
      <span className="app-nav__brand">{t('app.name')}</span>
      <NavLink to="/" end>
        {t('nav.search')}
      </NavLink>
      <NavLink to="/bookings">{t('nav.bookings')}</NavLink>
      <NavLink to="/settings">{t('nav.settings')}</NavLink>
    </nav>
  );
}

export default function App() {
  return (
    <SavedBookingsProvider>
      <BookingProvider>
        <ChatProvider>
          <div className="app">
            <AppNav />
            <Routes>
              <Route path="/" element={<Search />} />
              <Route
                path="/results"
                element={
                  <RequireStep step="results">
                    <Results />
                  </RequireStep>
                }
              />
              <Route
                path="/passengers"
                element={
                  <RequireStep step="passengers">
                    <Passengers />
                  </RequireStep>
                }
              />
              <Route
                path="/ancillaries"
                element={
                  <RequireStep step="ancillaries">
                    <Ancillaries />
                  </RequireStep>
                }
              />
              <Route
                path="/payment"
                element={
                  <RequireStep step="payment">
                    <Payment />
                  </RequireStep>
                }
              />
              <Route
                path="/confirmation"
                element={
                  <RequireStep step="confirmation">
                    <Confirmation />
                  </RequireStep>
                }
              />
              <Route path="/bookings" element={<SavedBookings />} />
              <Route path="/settings" element={<Settings />} />
              <Route path="*" element={<NotFound />} />
            </Routes>
            <ChatOverlay />
          </div>
        </ChatProvider>
      </BookingProvider>
    </SavedBookingsProvider>
  );
}
