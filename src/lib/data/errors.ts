/**
 * Flight data load errors
 *
 * Loader failures carry the dataset that failed and the stage it failed
 * at, so the app shell can tell a missing download from a broken file.
 */

export type FlightDataset = 'routes' | 'airports';

/** Stage at which loading failed */
export type FlightDataFailure = 'fetch' | 'parse' | 'timeout';

export class FlightDataError extends Error {
  readonly dataset: FlightDataset | null;
  readonly failure: FlightDataFailure;

  constructor(message: string, dataset: FlightDataset | null, failure: FlightDataFailure) {
    super(message);
    this.name = 'FlightDataError';
    this.dataset = dataset;
    this.failure = failure;
  }
}

/** What the error screen shows for a failed load */
export interface LoadErrorDescription {
  title: string;
  message: string;
  /** Shown only when downloading the datasets again can help */
  showDataHint: boolean;
}

const DATASET_LABELS: Record<FlightDataset, string> = {
  routes: 'routes table',
  airports: 'airport collection',
};

export function describeLoadError(error: Error): LoadErrorDescription {
  if (!(error instanceof FlightDataError)) {
    return { title: 'Something went wrong', message: error.message, showDataHint: false };
  }

  const label = error.dataset ? DATASET_LABELS[error.dataset] : 'flight data';
  switch (error.failure) {
    case 'fetch':
      return { title: `Could not load the ${label}`, message: error.message, showDataHint: true };
    case 'parse':
      return { title: `The ${label} is malformed`, message: error.message, showDataHint: false };
    case 'timeout':
      return { title: 'Loading timed out', message: error.message, showDataHint: false };
  }
}
