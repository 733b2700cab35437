export interface IStudent {
  id: string;
  studentId: string;
  name: string;
  email: string;
  isBlocked: boolean;
  createdAt: Date;
}

export interface StudentWithSecret extends IStudent {
  passwordHash: string;
}

export interface NewStudent {
  studentId: string;
  name: string;
  email: string;
  passwordHash: string;
}

export interface StudentStore {
  create(input: NewStudent): Promise<IStudent>;
  findById(id: string): Promise<IStudent | null>;
  /** Looks a student up by e-mail or institution id, including the password hash. */
  findForLogin(identifier: string): Promise<StudentWithSecret | null>;
  existsByEmailOrStudentId(email: string, studentId: string): Promise<boolean>;
  toggleBlocked(id: string): Promise<IStudent | null>;
  /** False when no student has that id. */
  updatePasswordHash(id: string, passwordHash: string): Promise<boolean>;
}
