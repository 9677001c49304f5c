// Public library surface.

export { VERSION } from './version';

export * from './errors';
export * from './cli/io';
export * from './config/rcfile';
export * from './config/coverageConfig';
export * from './data/coverageData';
export * from './select/fileSelector';
export * from './select/sourceAccess';
export * from './annotate/annotator';
export * from './report/coverageSummary';
export * from './report/textReport';
export * from './report/markdownReport';
export * from './report/htmlReport';
export * from './debug/debugControl';
export { main, runAnnotate, runHtml, runReport } from './cli';
export type { AnnotateCommandOptions, HtmlCommandOptions, ReportCommandOptions, ReportFormat } from './cli';
