// src/lib/utils/id.ts

/** Time-sortable unique id: `<prefix>-<unixMs>-<randomBase36>`. */
export function generateUniqueId(prefix = "id"): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

export const generateMarkerId = () => generateUniqueId("marker");
