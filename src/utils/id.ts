import { v7 as uuidv7 } from 'uuid'

// UUIDv7: time-ordered, so ids sort lexicographically by creation time
export const newId = (): string => uuidv7()
