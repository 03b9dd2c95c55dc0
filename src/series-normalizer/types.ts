export type ChannelValue = string | number | null | undefined;

export type RawRow = {
  readonly timestamp: string;
  readonly rateA?: ChannelValue;
  readonly rateB?: ChannelValue;
  readonly rateC?: ChannelValue;
};

export type ParsedTimestamp = {
  readonly timestamp: Date; // wall-clock time stored in the UTC fields
  readonly rolledOver: boolean; // written as 24:00 of the previous day
};

export type Sample = {
  readonly timestamp: Date;
  readonly date: string; // YYYY-MM-DD
  readonly hourOfDay: number; // fractional hours, e.g. 16.75 = 16:45
  readonly rateA: number;
  readonly rateB: number;
  readonly rateC: number;
  readonly consumption: number; // kW, rateA + rateB + rateC
};

export type DaySeries = {
  readonly date: string;
  readonly samples: readonly Sample[];
};

export type NormalizedSeries = {
  readonly samples: readonly Sample[];
  readonly dates: readonly string[];
  readonly droppedRows: number;
};
