import { z } from 'zod';

// GitHub のユーザー名: 英数字とハイフンのみ、最大 39 文字
const UsernameSchema = z.string()
  .min(1)
  .max(39)
  .regex(/^[A-Za-z0-9-]+$/);

export function parseUsername(value: string): string {
  const result = UsernameSchema.safeParse(value.trim());
  if (!result.success) {
    throw new Error(`GitHub ユーザー名として不正です: ${JSON.stringify(value)}`);
  }
  return result.data;
}
