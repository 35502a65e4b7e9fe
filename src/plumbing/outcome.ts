// Expected rejections travel as values; thrown errors are reserved for faults.
export type Outcome<T, E> =
  | { isSuccess: true; data: T }
  | { isSuccess: false; error: E }

export const succeed = <T>(data: T): { isSuccess: true; data: T } => ({
  isSuccess: true,
  data,
})

export const fail = <E>(error: E): { isSuccess: false; error: E } => ({
  isSuccess: false,
  error,
})
