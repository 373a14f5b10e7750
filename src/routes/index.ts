/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export { default as analysisRoutes, handleAnalysisRequest } from "./analysis";
export type { AnalysisResponseData } from "./analysis";
