export type KeyNameMap<T> = { [P in keyof T]: P };
export type OmitStrict<T, K extends keyof T> = Omit<T, K>;
export type PartialBy<T, K extends keyof T> = OmitStrict<T, K> & Partial<Pick<T, K>>;
