export {
  PlotError,
  ErrorCode,
  EmptyInputError,
  UnknownCentralityError,
  InvalidIntervalMassError,
  ReshapeError,
  isPlotError,
  wrapError,
} from './PlotError';
