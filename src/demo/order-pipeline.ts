import { createAsyncResult, fromAsyncResult } from '../async/result-async.js'
import { Err, Ok, fromNullable, type Result } from '../shared/result.js'
import { AppError } from './errors.js'

export type User = { id: string; name: string }

export type Order = { id: string; userId: string; productId: string; quantity: number }

// External services: may resolve to null for "not found", may also throw
export type OrderServices = {
  getOrder: (orderId: string) => Promise<Order | null>
  getUser: (userId: string) => Promise<User | null>
  checkInventory: (productId: string) => Promise<number>
}

const formatOrder = (order: Order, user: User, stock: number): string =>
  `Order ${order.id} for ${user.name}: ${order.quantity} of ${order.productId} (stock: ${stock})`

export const createOrderPipeline = (services: OrderServices) => {
  const AppResult = createAsyncResult(AppError)

  // Service wrappers: "not found" becomes a typed error, a throw becomes a crash error
  const getOrderSafe = (orderId: string): Promise<Result<Order, AppError>> =>
    fromAsyncResult(
      async () => fromNullable(await services.getOrder(orderId), AppError.orderNotFound(orderId)),
      AppError.orderCrashed
    )

  const getUserSafe = (userId: string): Promise<Result<User, AppError>> =>
    fromAsyncResult(
      async () => fromNullable(await services.getUser(userId), AppError.userNotFound(userId)),
      AppError.userCrashed
    )

  const checkInventorySafe = (productId: string, requested: number): Promise<Result<number, AppError>> =>
    fromAsyncResult(async (): Promise<Result<number, AppError>> => {
      const available = await services.checkInventory(productId)
      return requested > available
        ? Err(AppError.insufficientStock(productId, requested, available))
        : Ok(available)
    }, AppError.inventoryCrashed)

  // Fluent style: intermediate values are carried forward in tuples
  const processOrder = (orderId: string): Promise<Result<string, AppError>> =>
    AppResult.settle(
      AppResult.chain(getOrderSafe(orderId))
        .andThen((order) => AppResult.map(getUserSafe(order.userId), (user) => ({ order, user })))
        .andThen(({ order, user }) =>
          AppResult.map(checkInventorySafe(order.productId, order.quantity), (stock) => ({ order, user, stock }))
        )
        .map(({ order, user, stock }) => formatOrder(order, user, stock))
    )

  // Comprehension style: bind keeps every earlier value in scope through the projection
  const processOrderBound = (orderId: string): Promise<Result<string, AppError>> =>
    AppResult.settle(
      AppResult.chain(getOrderSafe(orderId))
        .bind((order) => getUserSafe(order.userId), (order, user) => ({ order, user }))
        .bind(
          ({ order }) => checkInventorySafe(order.productId, order.quantity),
          ({ order, user }, stock) => formatOrder(order, user, stock)
        )
    )

  return {
    getOrderSafe,
    getUserSafe,
    checkInventorySafe,
    processOrder,
    processOrderBound,
  }
}
