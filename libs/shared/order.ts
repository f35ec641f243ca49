import { z } from 'zod';

export const OrderStatuses = [
  'placed',
  'preparing',
  'ready',
  'delivered',
  'cancelled',
] as const;
export type OrderStatus = (typeof OrderStatuses)[number];

/** Every state reachable in one step, including cancellation. */
export const ORDER_STATUS_TRANSITIONS: Readonly<
  Record<OrderStatus, readonly OrderStatus[]>
> = {
  placed: ['preparing', 'cancelled'],
  preparing: ['ready', 'cancelled'],
  ready: ['delivered', 'cancelled'],
  delivered: [],
  cancelled: [],
} as const;

/** The single forward step a shop can take from each state. */
export const ORDER_STATUS_FLOW: Readonly<
  Record<OrderStatus, OrderStatus | null>
> = {
  placed: 'preparing',
  preparing: 'ready',
  ready: 'delivered',
  delivered: null,
  cancelled: null,
};

export const PaymentMethods = ['cod'] as const;
export type PaymentMethod = (typeof PaymentMethods)[number];

export const PaymentStatuses = ['pending', 'completed'] as const;
export type PaymentStatus = (typeof PaymentStatuses)[number];

export const CancelledByRoles = ['student', 'shop_owner', 'admin'] as const;
export type CancelledBy = (typeof CancelledByRoles)[number];

export const OrderStatusSchema = z.enum(OrderStatuses);
export const PaymentMethodSchema = z.enum(PaymentMethods);

export const TimeSlotSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
});
export type TimeSlotInput = z.infer<typeof TimeSlotSchema>;

/** Per line, in the cart and on an order. */
export const MAX_ITEM_QUANTITY = 99;

/** Upper bound of the money columns (Postgres int4). */
export const MAX_ORDER_CENTS = 2_147_483_647;

export const CreateOrderItemSchema = z.object({
  menuItemId: z.string().uuid(),
  quantity: z.number().int().min(1).max(MAX_ITEM_QUANTITY),
});
export type CreateOrderItemInput = z.infer<typeof CreateOrderItemSchema>;

export const CreateOrderSchema = z.object({
  restaurantId: z.string().uuid(),
  // omitted items fall back to the session cart
  items: z.array(CreateOrderItemSchema).optional(),
  timeSlot: TimeSlotSchema,
  deliveryAddress: z.string().trim().optional(),
  paymentMethod: PaymentMethodSchema.optional(),
});
export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;

export const UpdateOrderStatusSchema = z.object({
  status: OrderStatusSchema,
});
export type UpdateOrderStatusInput = z.infer<typeof UpdateOrderStatusSchema>;

export const CancelOrderSchema = z.object({
  reason: z.string().optional(),
  noShow: z.boolean().optional(),
});
export type CancelOrderInput = z.infer<typeof CancelOrderSchema>;

export const OrderListQuerySchema = z.object({
  status: OrderStatusSchema.optional(),
});
export type OrderListQuery = z.infer<typeof OrderListQuerySchema>;

export const STATUS_CHANGE_MESSAGES: Readonly<Record<OrderStatus, string>> = {
  placed: 'Your order has been placed.',
  preparing: 'Your food is being prepared.',
  ready: 'Your order is ready for pickup/delivery.',
  delivered: 'Your order has been delivered. Enjoy your meal!',
  cancelled: 'Your order has been cancelled.',
};
