export type PropertyMap = Readonly<Record<string, unknown>>;
