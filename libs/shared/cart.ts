import { z } from 'zod';
import { MAX_ITEM_QUANTITY } from './order';

/** menu item id -> quantity, for a single restaurant */
export type CartLines = Readonly<Record<string, number>>;

export type CartLineView = {
  menuItemId: string;
  name: string;
  unitPriceCents: number;
  quantity: number;
  subtotalCents: number;
};

export const AddCartItemSchema = z.object({
  restaurantId: z.string().uuid(),
  menuItemId: z.string().uuid(),
  quantity: z.number().int().min(1).max(MAX_ITEM_QUANTITY).default(1),
});
export type AddCartItemInput = z.infer<typeof AddCartItemSchema>;

export const UpdateCartItemSchema = z.object({
  restaurantId: z.string().uuid(),
  menuItemId: z.string().uuid(),
  quantity: z.number().int().max(MAX_ITEM_QUANTITY),
});
export type UpdateCartItemInput = z.infer<typeof UpdateCartItemSchema>;

export function addCartLine(
  lines: CartLines,
  menuItemId: string,
  quantity: number,
): CartLines {
  return { ...lines, [menuItemId]: (lines[menuItemId] ?? 0) + quantity };
}

/** Sets the quantity; zero or below removes the line. */
export function setCartLine(
  lines: CartLines,
  menuItemId: string,
  quantity: number,
): CartLines {
  const { [menuItemId]: _removed, ...rest } = lines;
  if (quantity <= 0) return rest;
  return { ...rest, [menuItemId]: quantity };
}

export function cartItemCount(lines: CartLines): number {
  return Object.values(lines).reduce((sum, qty) => sum + qty, 0);
}

export function cartTotalCents(lines: readonly CartLineView[]): number {
  return lines.reduce((sum, line) => sum + line.subtotalCents, 0);
}
