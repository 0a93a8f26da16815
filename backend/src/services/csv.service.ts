import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { CsvWriteMode, RideQuote } from '../interfaces/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('Csv');

// route, ride type, price and timestamp lead; fare breakdown follows
export const CSV_COLUMNS = [
  'route',
  'ride_type',
  'price',
  'timestamp',
  'base_fare',
  'minimum_fare',
  'per_minute',
  'per_kilometer',
  'wait_charge',
] as const;

export type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

export function toCsvRow(quote: RideQuote): CsvRow {
  return {
    route: quote.route,
    ride_type: quote.rideType,
    price: quote.price,
    timestamp: quote.scrapedAt.toISOString(),
    base_fare: quote.baseFare,
    minimum_fare: quote.minimumFare,
    per_minute: quote.perMinute,
    per_kilometer: quote.perKilometer,
    wait_charge: quote.waitCharge,
  };
}

export function fileNameForRideType(rideType: string): string {
  const safe = rideType.trim().replace(/[^A-Za-z0-9._-]+/g, '_');
  return `${safe || 'unknown'}.csv`;
}

export class CsvWriter {
  // Files already started in this run (overwrite mode truncates each one once)
  private started = new Set<string>();

  constructor(private readonly outputDir: string, private readonly mode: CsvWriteMode = 'append') {}

  pathFor(rideType: string): string {
    return path.join(this.outputDir, fileNameForRideType(rideType));
  }

  /**
   * Append one quote to its ride type's file, writing the header first if the file is empty.
   */
  write(quote: RideQuote): string {
    const filePath = this.pathFor(quote.rideType);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    if (this.mode === 'overwrite' && !this.started.has(filePath)) {
      fs.writeFileSync(filePath, '');
    }
    this.started.add(filePath);

    const isEmpty = !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
    const csv = stringify([toCsvRow(quote)], {
      header: isEmpty,
      columns: [...CSV_COLUMNS],
    });
    fs.appendFileSync(filePath, csv, 'utf-8');

    logger.info(`Saved ${quote.rideType} data`, { route: quote.route, file: filePath });
    return filePath;
  }
}
