/**
 * Demand Analytics Types
 */

export type Trend = 'increasing' | 'decreasing' | 'stable';
export type Granularity = 'daily' | 'weekly' | 'monthly';

export interface MovingAverageForecast {
  window: number;
  movingAverage: number;
  trend: Trend;
  horizonDays: number;
  projectedTotal: number;
  historicalDays: number;
}

export interface DemandForecast extends MovingAverageForecast {
  productId: string;
  recentDaily: Array<{ date: string; qty: number }>;
}

export interface ZScoreFlag {
  index: number;
  value: number;
  zScore: number;
}

export interface ZScoreScan {
  mean: number;
  stdDev: number;
  flagged: ZScoreFlag[];
}

export interface AnomalyReport {
  table: string;
  column: string;
  zThreshold: number;
  mean: number;
  stdDev: number;
  totalRows: number;
  anomaliesFound: number;
  anomalies: Array<{ rowNumber: number; value: number; zScore: number; row: Record<string, string | number | null> }>;
}

export interface RevenuePeriod {
  period: string;
  revenue: number;
  units: number;
  skus: number;
  /** null for the first period */
  growthPct: number | null;
}

export interface RevenueTrends {
  granularity: Granularity;
  periods: RevenuePeriod[];
}

export interface VelocityLine {
  productId: string;
  totalSold: number;
  saleDays: number;
  dailyVelocity: number;
  totalRevenue: number;
}

export interface TopSku {
  productId: string;
  productName: string | null;
  revenue: number;
  units: number;
  grossProfit: number | null;
}

export interface CustomerShare {
  customerId: string;
  customerName: string | null;
  revenue: number;
  sharePct: number;
}

export interface CustomerConcentration {
  totalRevenue: number;
  topCustomers: CustomerShare[];
  topSharePct: number;
  concentrationRisk: 'high' | 'medium' | 'low';
  note?: string;
}

export interface MonthIndex {
  month: number;
  qty: number;
  revenue: number;
  seasonalIndex: number;
}

export interface Seasonality {
  productId: string | null;
  months: MonthIndex[];
  peakMonth: number;
  lowMonth: number;
}
