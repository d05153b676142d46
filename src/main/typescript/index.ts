/**
 * INPUT: 環境變數（.env）
 * OUTPUT: Express HTTP 伺服器（貸款決策 API）
 * POS: 應用程式進入點，整合路由與中介層
 */

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loanDecisionRouter } from './api/loanDecision';

const app = express();
const PORT = process.env.PORT || 3000;

app.use(express.json());

// 前端公開 API（允許 CORS）
app.use('/api', (_req, res, next) => {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
  res.header('Access-Control-Allow-Methods', 'POST, OPTIONS');
  next();
});
app.options('/api/*', (_req, res) => res.sendStatus(200));
app.use('/api', loanDecisionRouter);

// 健康檢查
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'loan-decision-engine' });
});

// 啟動伺服器
app.listen(PORT, () => {
  console.log(`🚀 貸款決策引擎 啟動成功`);
  console.log(`📡 伺服器運行於 http://localhost:${PORT}`);
});
