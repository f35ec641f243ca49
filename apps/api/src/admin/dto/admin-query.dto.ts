import { z } from 'zod';
import { UserRoles } from '../../auth/entities/user.entity';

const page = z.coerce.number().int().min(1).default(1);
const pageSize = z.coerce.number().int().min(1).max(100).default(20);
const search = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const AdminUserListQuerySchema = z.object({
  search,
  role: z.enum(UserRoles).optional(),
  page,
  pageSize,
});
export type AdminUserListQuery = z.infer<typeof AdminUserListQuerySchema>;

export const AdminRestaurantListQuerySchema = z.object({
  search,
  page,
  pageSize,
});
export type AdminRestaurantListQuery = z.infer<
  typeof AdminRestaurantListQuerySchema
>;

export const RecentOrdersQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
export type RecentOrdersQuery = z.infer<typeof RecentOrdersQuerySchema>;
