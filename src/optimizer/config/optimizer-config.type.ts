export type OptimizerConfig = {
  defaultTradeOff: number;
  intervalsCsvPath: string;
  maxIntervals: number;
};
