/**
 * ヘルスチェック・ルートインデックス
 */

import { Router, Request, Response } from "express";

const SERVICE_NAME = "rsya-placement-analyzer";
const SERVICE_VERSION = process.env.npm_package_version || "1.0.0";

const router = Router();

// ルート一覧
router.get("/", (_req: Request, res: Response) => {
  return res.json({
    message: "RSYA Placement Analyzer API",
    version: SERVICE_VERSION,
    endpoints: {
      health: "GET /health",
      analysis: "POST /analysis",
    },
  });
});

// ヘルスチェック
router.get("/health", (_req: Request, res: Response) => {
  return res.status(200).json({
    status: "healthy",
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    timestamp: new Date().toISOString(),
  });
});

export default router;
