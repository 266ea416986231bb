export * from './types';
export type { ScanErrorDetail } from './types/commandError';

export * from './constants/control';
export * from './constants/scan';

export { classifyLine } from './services/lineParser';
export type { LineClassification, LineClassifierOptions } from './services/lineParser';
export type {
    DisconnectHandler,
    LineHandler,
    LineTransport,
    TransportFactory,
    TransportRequest,
} from './services/lineTransport';
export { LogStore, MAX_LOG_ENTRIES } from './services/logStore';
export type {
    AppendLogParams,
    LogEntry,
    LogSeverity,
    LogStoreOptions,
    ScanLogger,
} from './services/logStore';
export { MeasurementGrid, NO_DATA } from './services/measurementGrid';
export type { MeasurementGridView } from './services/measurementGrid';
export { MockStageTransport, defaultMockSignal } from './services/mockTransport';
export type { MockSignal, MockStageOptions, MockStageSnapshot } from './services/mockTransport';
export { ScanController, createIdleScanState } from './services/scanController';
export type { SampleWrittenListener, ScanControllerParams } from './services/scanController';
export * from './services/scanErrors';
export {
    computeRasterCount,
    parseScanParameters,
    validateRegion,
    validateScanParameters,
} from './services/scanParameters';
export type { ParameterError, ScanParametersParseResult } from './services/scanParameters';
export { SerialLineTransport, listSerialPorts } from './services/serialTransport';
export type { SerialPortFactory, SerialPortRequest } from './services/serialTransport';
export { DEFAULT_STAGE_LINK_SETTINGS, StageLink } from './services/stageLink';
export type { StageLinkParams, StageLinkSettings } from './services/stageLink';
export {
    formatMoveCommand,
    formatSettleDelayCommand,
    formatSpeedCommand,
    parseMoveCommand,
} from './services/stageProtocol';
export type { ParsedMoveCommand } from './services/stageProtocol';

export * from './overlays';

export { extractScanErrorDetail, normalizeScanError } from './utils/commandErrors';
export type { NormalizedScanError } from './utils/commandErrors';
export { getLinkStatusLabel, getScanPhaseLabel, isLinkOffline } from './utils/connectionStatus';
