export interface IAdmin {
  id: string;
  username: string;
  email: string;
  name: string;
  isActive: boolean;
  createdAt: Date;
}

export interface AdminWithSecret extends IAdmin {
  passwordHash: string;
}

export interface NewAdmin {
  username: string;
  email: string;
  name: string;
  passwordHash: string;
}

export interface AdminStore {
  create(input: NewAdmin): Promise<IAdmin>;
  findById(id: string): Promise<IAdmin | null>;
  findByUsername(username: string): Promise<IAdmin | null>;
  /** Looks an admin up by username or e-mail, including the password hash. */
  findForLogin(identifier: string): Promise<AdminWithSecret | null>;
  existsByUsernameOrEmail(username: string, email: string): Promise<boolean>;
  /** False when no admin has that id. */
  updatePasswordHash(id: string, passwordHash: string): Promise<boolean>;
}
