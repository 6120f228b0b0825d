/** Injection token for the user-existence capability handed to other modules. */
export const USER_DIRECTORY = Symbol("USER_DIRECTORY")

export interface UserDirectory {
  exists(userId: string): Promise<boolean>
}
