import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { createPool } from '../pool.js';
import { migrate } from '../migrate.js';
import { UserRepo } from '../userRepo.js';
import { DuplicateEmailError } from '../../../domain/auth/errors.js';

const databaseUrl = process.env.DATABASE_URL;
const describeDb = databaseUrl ? describe : describe.skip;

describeDb('UserRepo', () => {
  const pool = createPool(databaseUrl ?? '');
  const repo = new UserRepo(pool);
  const uniqueEmail = (label: string) =>
    `vitest-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}@example.com`;

  beforeAll(async () => {
    await migrate(pool);
  });

  afterEach(async () => {
    await pool.query("DELETE FROM users WHERE email LIKE 'vitest-%@example.com'");
  });

  afterAll(async () => {
    await pool.end();
  });

  it('should insert and find a user by email', async () => {
    const email = uniqueEmail('find');
    const inserted = await repo.insert({ name: 'Ann', email, passwordHash: '$argon2id$stub' });

    expect(inserted.ok).toBe(true);
    const found = await repo.findByEmail(email);
    expect(found?.name).toBe('Ann');
    expect(found?.passwordHash).toBe('$argon2id$stub');
    expect(found?.createdAt).toBeInstanceOf(Date);
  });

  it('should return null for an unknown email', async () => {
    await expect(repo.findByEmail(uniqueEmail('missing'))).resolves.toBeNull();
  });

  it('should report a duplicate email without touching the first row', async () => {
    const email = uniqueEmail('dup');
    await repo.insert({ name: 'Ann', email, passwordHash: 'first' });

    const second = await repo.insert({ name: 'Other', email, passwordHash: 'second' });

    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error).toBeInstanceOf(DuplicateEmailError);
    }
    expect((await repo.findByEmail(email))?.passwordHash).toBe('first');
  });

  it('should let exactly one of two concurrent inserts win', async () => {
    const email = uniqueEmail('race');

    const results = await Promise.all([
      repo.insert({ name: 'A', email, passwordHash: 'a' }),
      repo.insert({ name: 'B', email, passwordHash: 'b' }),
    ]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    const count = await pool.query<{ n: string }>(
      'SELECT COUNT(*) AS n FROM users WHERE email = $1',
      [email]
    );
    expect(count.rows[0].n).toBe('1');
  });
});
