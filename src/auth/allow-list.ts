export interface Authorizer {
  isAllowed(userId: number): boolean
}

export function createAllowListAuthorizer(userIds: readonly number[]): Authorizer {
  const allowed = new Set(userIds)

  return {
    isAllowed: (userId) => allowed.has(userId)
  }
}
