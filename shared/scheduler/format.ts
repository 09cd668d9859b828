interface UnitStep {
  suffix: string;
  size: number;       // in the table's base unit
  upTo: number;       // exclusive, in the table's base unit
}

// Below a day: whole minutes or hours
const CLOCK_UNITS: readonly UnitStep[] = [
  { suffix: 'm', size: 1, upTo: 60 },
  { suffix: 'h', size: 60, upTo: 24 * 60 },
];

// From a day on: whole days, then one decimal at most
const CALENDAR_UNITS: readonly UnitStep[] = [
  { suffix: 'd', size: 1, upTo: 7 },
  { suffix: 'w', size: 7, upTo: 30 },
  { suffix: 'mo', size: 30, upTo: 365 },
  { suffix: 'y', size: 365, upTo: Infinity },
];

const MINUTES_PER_DAY = 24 * 60;

function pick(units: readonly UnitStep[], amount: number): UnitStep {
  return units.find(unit => amount < unit.upTo) ?? units[units.length - 1];
}

function oneDecimal(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

/**
 * Short label for an interval given in minutes, e.g. "10m", "3h", "2.5mo".
 * Pass `collapseBelow` to show "<Nm" for anything shorter than N minutes.
 */
export function formatInterval(minutes: number, collapseBelow = 1): string {
  if (minutes < collapseBelow) return `<${collapseBelow}m`;
  if (minutes < 1) return '<1m';

  if (minutes < MINUTES_PER_DAY) {
    const unit = pick(CLOCK_UNITS, minutes);
    return `${Math.round(minutes / unit.size)}${unit.suffix}`;
  }

  const days = Math.round(minutes / MINUTES_PER_DAY);
  const unit = pick(CALENDAR_UNITS, days);
  return `${oneDecimal(days / unit.size)}${unit.suffix}`;
}
