import type { PoolStats } from "./poolAdapters";

export type AccountData = {
  accountId: number;
  name: string;
  address: string;
  adapterKey: string;
  coin: string;
  stats: PoolStats | null;
  error: string | null;
};

export type DashboardData = {
  accounts: AccountData[];
  networkDifficulty: Record<string, number | null>;
  lastUpdated: Date;
};

// Written only by the pool polling cycle; replaced wholesale, never patched
let _latest: Readonly<DashboardData> | null = null;

export function getLatestStats(): Readonly<DashboardData> | null {
  return _latest;
}

export function publishLatestStats(data: DashboardData): void {
  _latest = Object.freeze({ ...data, accounts: [...data.accounts] });
}

export function clearLatestStats(): void {
  _latest = null;
}
