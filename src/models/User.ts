import { getDb } from '../config/db';

export interface IUser {
  id: number;
  username: string;
  passwordHash: string;
}

const USER_COLUMNS = 'id, username, password_hash AS passwordHash';

const UserModel = {
  create(username: string, passwordHash: string): IUser {
    const result = getDb()
      .prepare<[string, string]>('INSERT INTO users (username, password_hash) VALUES (?, ?)')
      .run(username, passwordHash);
    return { id: Number(result.lastInsertRowid), username, passwordHash };
  },

  findByUsername(username: string): IUser | undefined {
    return getDb()
      .prepare<[string], IUser>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`)
      .get(username);
  },
};

export default UserModel;
