export interface PendingChange {
  path: string;
  firstSeenAt: number;
  lastSeenAt: number;
}
