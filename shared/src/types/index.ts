// User Types
export type UserRole = 'customer' | 'owner' | 'delivery' | 'admin';

export interface UserIdentity {
  userId: string;
  role: UserRole;
}

// Re-export all types
export * from './wallet.js';
