export { normalizeRequest, sanitizeId } from "./inputNormalizer";
export type { NormalizeOptions } from "./inputNormalizer";
