// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type TaskId = Brand<`0x${string}`, "TaskId">;

export const asTaskId = (s: `0x${string}`): TaskId => s as TaskId;
