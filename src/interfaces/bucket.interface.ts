export interface IClientBucket {
  key: string;
  tokens: number;
  lastRefill: number; // Admission clock, milliseconds
  createdAt?: Date;
  updatedAt?: Date;
}
