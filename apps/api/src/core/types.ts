import type { Username } from './branded-types.js';

export interface AnalysisRequest {
  url: string;
  analyzerKind: string;
  model?: string;
}

export interface AnalysisResult {
  left: number;
  right: number;
  message: string;
  explanation: string;
}

export interface HistoryRecord {
  user: Username;
  url: string;
  analyzerKind: string;
  model: string | null;
  result: AnalysisResult;
  timestamp: Date;
}

export interface UserAccount {
  id: Username;
  passwordHash: string;
}

export enum ExtractionOutcome {
  Article = 'article',
  DownloadLink = 'download-link',
  NotFound = 'not-found',
  Forbidden = 'forbidden',
  Blocked = 'blocked',
  Failed = 'failed',
}

export enum ExtractionStrategy {
  Readability = 'readability',
  ContentSelector = 'content-selector',
  FullPage = 'full-page',
}

export interface ExtractedText {
  text: string;
  outcome: ExtractionOutcome;
  strategy?: ExtractionStrategy;
  cached: boolean;
}

export interface ReadabilityResult {
  title: string;
  text: string;
}

export interface AnalyzeResponse {
  results: AnalysisResult;
  console_message: string;
}

export interface HistoryItem {
  url: string;
  analyzer_type: string;
  model: string | null;
  left: number;
  right: number;
  message: string;
  explanation: string;
  date: string;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
  services: {
    store: boolean;
  };
}
