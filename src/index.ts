/**
 * Library entry: the digitization pipeline and its stages.
 */
export * from './types/index.js';
export { DigitizerError, isDigitizerError, type DigitizerErrorKind } from './utils/errors.js';
export { initLogger, getLogger, type LoggerOptions, type LogStage } from './utils/logger.js';
export { resolveConfig } from './utils/config.js';
export { loadMetadata } from './utils/metadata.js';

export { parseDocument, type ParseOptions } from './svg/document.js';
export { classify, type ClassifyOptions } from './plot/classifier.js';
export { parseLabel, parseMeasurement, type PlotLabel, type LabelResult, type Measurement } from './plot/labels.js';
export { buildAxisCalibration, buildCalibrations } from './calibration/axis-calibration.js';
export {
    solveAxis,
    solveTransform,
    applyAxis,
    invertAxis,
    applyTransform,
    type SolveOptions,
} from './calibration/solver.js';
export { selectCurve, extract, type XYColumn, type ExtractOptions } from './sampling/curve.js';
export { resample } from './sampling/resample.js';
export { DataTable, type Row, type TableView } from './table/data-table.js';
export { digitize, digitizeDocument, type DigitizeOptions, type DigitizeResult } from './pipeline/digitize.js';

export { parseUnit, tryParseUnit, toSI, conversionFactor, type ParsedUnit, type QuantityKind } from './units/units.js';
export { toCV, toCVTable, type CVResult, type CVInput } from './electrochemistry/cv.js';
export { mergeMetadata, type Metadata } from './electrochemistry/metadata.js';

export { toCsv, writeCsv } from './exporters/csv.js';
export { toJson, writeJson } from './exporters/json.js';
export { buildDataPackage, type DataPackage } from './exporters/package.js';
export { renderPlot, writePlot, type PlotOptions } from './viewer/svg-plot.js';
