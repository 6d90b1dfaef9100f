import type { Order, OrderServices, User } from './order-pipeline.js'

// Helper function for sleep
const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const users: Partial<Record<string, User>> = {
  'user-1': { id: 'user-1', name: 'Alice' },
}

const orders: Partial<Record<string, Order>> = {
  'order-1': { id: 'order-1', userId: 'user-1', productId: 'product-1', quantity: 5 },
  'order-2': { id: 'order-2', userId: 'user-1', productId: 'product-1', quantity: 100 },
  'order-3': { id: 'order-3', userId: 'user-missing', productId: 'product-1', quantity: 1 },
  'order-4': { id: 'order-4', userId: 'crash', productId: 'product-1', quantity: 1 },
  'order-5': { id: 'order-5', userId: 'user-1', productId: 'product-missing', quantity: 1 },
}

const stock: Partial<Record<string, number>> = {
  'product-1': 10,
}

/**
 * In-memory stand-ins for the order, user and inventory services.
 * The id `crash` makes a lookup throw; unknown ids resolve to null.
 * Unknown products make the inventory service throw.
 */
export const createFakeOrderServices = (latencyMs: number): OrderServices => ({
  getOrder: async (orderId) => {
    await sleep(latencyMs)
    if (orderId === 'crash') throw new Error('Order API timeout')
    return orders[orderId] ?? null
  },
  getUser: async (userId) => {
    await sleep(latencyMs)
    if (userId === 'crash') throw new Error('User DB connection failed')
    return users[userId] ?? null
  },
  checkInventory: async (productId) => {
    await sleep(latencyMs)
    const available = stock[productId]
    if (available === undefined) throw new Error('Inventory service down')
    return available
  },
})
