// backend/leaderboard/leaderboard.types.ts

export interface RankedEntry {
  id: string;
  username: string;
  avatar: string | null;
  score: number;
  position: number;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface LeaderboardPage {
  items: RankedEntry[];
  page: number;
  pageSize: number;
}
