/**
 * Step Indicator
 * Shows where the traveller is in the booking flow
 */

import { useTranslation } from 'react-i18next';
import { BOOKING_STEPS, type BookingStep } from '../../types';

interface StepIndicatorProps {
  current: BookingStep;
}

export default function StepIndicator({ current }: StepIndicatorProps) {
  const { t } = useTranslation();
  const currentIndex = BOOKING_STEPS.indexOf(current);

  return (
    <ol className="step-indicator">
      {BOOKING_STEPS.map((step, index) => {
        const status = index < currentIndex ? 'done' : index === currentIndex ? 'current' : 'todo';
        return (
          <li
            key={step}
            className={`step-indicator__step step-indicator__step--${status}`}
            aria-current={status === 'current' ? 'step' : undefined}
          >
            <span className="step-indicator__number">{index + 1}</span>
            <span className="step-indicator__label">{t(`steps.${step}`)}</span>
          </li>
        );
      })}
    </ol>
  );
}
