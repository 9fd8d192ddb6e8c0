/**
 * Structural patterns used by the analyzers. All are line-anchored (multiline)
 * and case-insensitive; the first capture group is the extracted value.
 * Use them through `ok()` / `extractAll()` from ./matcher.js, which never reuse
 * a stateful global RegExp.
 */
export const Patterns = {
  dockerFrom: /^\s*FROM\s+(.+)$/im,
  dockerUser: /^\s*USER\s+(.+)$/im,
  dockerHealthcheck: /^\s*HEALTHCHECK\b/im,
  k8sKind: /^\s*kind:\s*([A-Za-z0-9]+)\s*$/im,
  serviceExposure: /^\s*type:\s*["']?(NodePort|LoadBalancer)["']?\s*$/im,
  markdownImage: /!\[[^\]]*\]\([^)]+\.(?:png|jpe?g|gif|svg|webp)\)/i,
} as const;
