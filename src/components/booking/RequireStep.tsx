/**
 * Route guard for booking-flow screens
 * Sends the traveller back to search when earlier steps are missing
 */

import type { ReactNode } from 'react';
import { Navigate } from 'react-router-dom';
import { useBooking } from '../../context/BookingContext';
import type { BookingStep } from '../../types';

interface RequireStepProps {
  step: BookingStep;
  children: ReactNode;
}

export default function RequireStep({ step, children }: RequireStepProps) {
  const { canEnterStep } = useBooking();

  if (!canEnterStep(step)) {
    return <Navigate to="/" replace />;
  }
  return <>{children}</>;
}
