export interface IBlockedEmail {
  id: string;
  email: string;
  isActive: boolean;
  createdAt: Date;
}

export interface BlockedEmailStore {
  isBlocked(email: string): Promise<boolean>;
  list(): Promise<IBlockedEmail[]>;
  /** Blocks an unknown address, otherwise flips the existing entry's `isActive`. */
  toggle(email: string): Promise<IBlockedEmail>;
}
