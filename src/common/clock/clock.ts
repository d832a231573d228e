import { format } from 'date-fns';

export const CLOCK = 'CLOCK';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Calendar date (yyyy-MM-dd) in server local time, the format of `date` columns. */
export const toDateString = (date: Date): string => format(date, 'yyyy-MM-dd');
