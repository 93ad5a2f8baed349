export * from "./compiler";
export { LanguageService, NO_DATA, CANCELLED } from "./services/languageService";
export type { Logger, Refactoring, Result } from "./services/languageService";
export { QueryRefactorConfig, mungeConfig } from "./services/config";
export { convertForEachToQuery, NotApplicableReason } from "./services/convertForEachToQuery";
export type { ConversionOptions, ConversionResult } from "./services/convertForEachToQuery";
export { classifyForEach } from "./services/forEachChain";
export type { ForEachChain, ExtendedNode } from "./services/forEachChain";
export { matchStrategy, ConversionStrategyKind } from "./services/strategyMatcher";
export type { ConversionStrategy } from "./services/strategyMatcher";
export { QueryBuilder } from "./services/queryBuilder";
export type { QueryConversion } from "./services/queryBuilder";
export { TextEdit, applyTextEdits } from "./services/conversionEdits";
