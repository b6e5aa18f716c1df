export interface User {
  id: number
  email: string
  username: string
  firstName: string
  lastName: string
  password: string
  avatar: string | null
  isStaff: boolean
  dateJoined: string
}

/** A user as seen by someone else, with the viewer's follow state attached. */
export interface UserProfile {
  id: number
  email: string
  username: string
  firstName: string
  lastName: string
  avatar: string | null
  isSubscribed: boolean
}

export interface NewUser {
  email: string
  username: string
  firstName: string
  lastName: string
  password: string
  isStaff?: boolean
}
