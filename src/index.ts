// Public library surface.

export { VERSION } from './version';

export * from './errors';
export * from './copybook/ast';
export * from './copybook/parser';
export * from './copybook/loadRecordsJson';
export * from './map/imported';
export * from './map/importRecord';
export * from './map/hierarchyBuilder';
export * from './map/mapRecords';
export * from './model/model';
export * from './model/renderText';
export * from './model/renderDot';
export * from './ir/irV1';
export * from './ir/ids';
export * from './ir/modelToIr';
export * from './ir/writeIrJson';
export * from './ir/canonicalizeIrModel';
export * from './ir/deterministicJson';
export * from './report/mappingReport';
export * from './report/reportBuilder';
export * from './report/markdownReport';
export * from './report/writeReport';
export * from './core/mapCopybook';
export * from './core/renderModel';
