export { default as StepIndicator } from './StepIndicator';
export { default as PassengerCounter } from './PassengerCounter';
export { default as RequireStep } from './RequireStep';
export { default as PriceBreakdown } from './PriceBreakdown';
