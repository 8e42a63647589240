const CAMEL_BOUNDARY = /([a-z0-9])([A-Z])/g;
const DISALLOWED = /[^a-zA-Z0-9_]/g;

export function sanitize(text: string): string {
  return text.replace(/%/g, "_percent").replace(DISALLOWED, "_");
}

/** `CostCenter` -> `cost_center`, `team-name` -> `team_name`. */
export function toSnakeCase(text: string): string {
  return sanitize(text.replace(CAMEL_BOUNDARY, "$1_$2")).toLowerCase();
}

export function metricNameFor(service: string): string {
  return `aws_${toSnakeCase(service)}_info`;
}

export function tagLabelName(key: string, snakeCase: boolean): string {
  return `tag_${snakeCase ? toSnakeCase(key) : sanitize(key)}`;
}
