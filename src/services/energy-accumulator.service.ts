import { CounterSample } from '@/types/telemetry.types';
import { Interval } from '@/types/report-request.types';
import { ImplausibleReadingError, InsufficientDataError } from '@/utils/errors';
import { formatInterval, getIntervalHours, isWithinInterval } from '@/utils/time-window.utils';

export interface EnergyOptions {
  pulsesPerKwh: number;
  maxPowerWatts: number;
}

export interface PulseDelta {
  pulses: number;
  resets: number;
}

export interface IntervalEnergy extends PulseDelta {
  energy_value: number;      // kWh
  sample_count: number;
}

/**
 * Sums pulse increments over consecutive samples. A decrease is read as one
 * counter reset, so the new value is the count since zero. Two or more resets
 * between the same pair of samples cannot be told apart from one and are
 * under-counted.
 */
export const accumulatePulses = (samples: CounterSample[]): PulseDelta => {
  let pulses = 0;
  let resets = 0;

  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1].value;
    const cur = samples[i].value;

    if (cur >= prev) {
      pulses += cur - prev;
    } else {
      pulses += cur;
      resets++;
    }
  }

  return { pulses, resets };
};

const validateSequence = (samples: CounterSample[]): void => {
  for (let i = 0; i < samples.length; i++) {
    const { timestamp, value } = samples[i];

    if (!Number.isInteger(value) || value < 0) {
      throw new ImplausibleReadingError(
        `Counter value at ${timestamp.toISOString()} is not a non-negative integer: ${value}`
      );
    }

    if (i > 0 && timestamp.getTime() <= samples[i - 1].timestamp.getTime()) {
      throw new ImplausibleReadingError(
        `Counter samples are not strictly increasing in time at ${timestamp.toISOString()}`
      );
    }
  }
};

export const getCeilingKwh = (interval: Interval, maxPowerWatts: number): number =>
  (maxPowerWatts * getIntervalHours(interval)) / 1000;

/**
 * Energy in kWh consumed during `interval`.
 *
 * Only samples inside [start, end) are used; `anchor` (the last sample before
 * `start`) closes the gap at the lower boundary when present.
 *
 * @throws InsufficientDataError when no sample falls inside the interval
 * @throws ImplausibleReadingError when the samples or the result fail sanity checks
 */
export const computeIntervalEnergy = (
  interval: Interval,
  samples: CounterSample[],
  anchor: CounterSample | null,
  options: EnergyOptions
): IntervalEnergy => {
  const inside = samples.filter(sample => isWithinInterval(sample.timestamp, interval));

  if (inside.length === 0) {
    throw new InsufficientDataError(`No counter samples within ${formatInterval(interval)}`);
  }

  const usableAnchor = anchor && anchor.timestamp.getTime() < interval.start.getTime() ? anchor : null;
  const sequence = usableAnchor ? [usableAnchor, ...inside] : inside;

  validateSequence(sequence);

  const { pulses, resets } = accumulatePulses(sequence);
  const energy_value = pulses / options.pulsesPerKwh;

  if (!Number.isFinite(energy_value) || energy_value < 0) {
    throw new ImplausibleReadingError(`Computed energy ${energy_value} kWh is not a valid consumption`);
  }

  const ceiling = getCeilingKwh(interval, options.maxPowerWatts);
  if (energy_value > ceiling) {
    throw new ImplausibleReadingError(
      `Computed energy ${energy_value} kWh for ${formatInterval(interval)} exceeds the ceiling of ${ceiling} kWh`
    );
  }

  return { energy_value, pulses, resets, sample_count: sequence.length };
};
