import { toError, type FromException } from '../shared/fault.js'

// Plain error for the basic demos
export type DemoError = { message: string }

export const DemoError = {
  of: (message: string): DemoError => ({ message }),
  fromException: (fault: unknown): DemoError => ({ message: `Caught: ${toError(fault).message}` }),
} satisfies FromException<DemoError> & Record<string, unknown>

// Every error the order pipeline can end in
export type AppError =
  // Business outcomes
  | { type: 'UserNotFound'; userId: string }
  | { type: 'OrderNotFound'; orderId: string }
  | { type: 'InsufficientStock'; productId: string; requested: number; available: number }
  // Crashes keep the original Error for logging
  | { type: 'UserServiceCrashed'; cause: Error }
  | { type: 'OrderServiceCrashed'; cause: Error }
  | { type: 'InventoryServiceCrashed'; cause: Error }
  | { type: 'UnknownCrash'; cause: Error }

export const AppError = {
  userNotFound: (userId: string): AppError => ({ type: 'UserNotFound', userId }),
  orderNotFound: (orderId: string): AppError => ({ type: 'OrderNotFound', orderId }),
  insufficientStock: (productId: string, requested: number, available: number): AppError =>
    ({ type: 'InsufficientStock', productId, requested, available }),
  userCrashed: (fault: unknown): AppError => ({ type: 'UserServiceCrashed', cause: toError(fault) }),
  orderCrashed: (fault: unknown): AppError => ({ type: 'OrderServiceCrashed', cause: toError(fault) }),
  inventoryCrashed: (fault: unknown): AppError => ({ type: 'InventoryServiceCrashed', cause: toError(fault) }),
  // Fallback for faults no service wrapper claimed
  fromException: (fault: unknown): AppError => ({ type: 'UnknownCrash', cause: toError(fault) }),
} satisfies FromException<AppError> & Record<string, unknown>

export const describeAppError = (error: AppError): string => {
  switch (error.type) {
    case 'UserNotFound':
      return `ERROR: User '${error.userId}' not found`
    case 'OrderNotFound':
      return `ERROR: Order '${error.orderId}' not found`
    case 'InsufficientStock':
      return `ERROR: Not enough ${error.productId} (need ${error.requested}, have ${error.available})`
    case 'UserServiceCrashed':
      return `CRASH: User service - ${error.cause.message}`
    case 'OrderServiceCrashed':
      return `CRASH: Order service - ${error.cause.message}`
    case 'InventoryServiceCrashed':
      return `CRASH: Inventory service - ${error.cause.message}`
    case 'UnknownCrash':
      return `CRASH: Unknown - ${error.cause.message}`
    default: {
      const unhandled: never = error
      return unhandled
    }
  }
}
