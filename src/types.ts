export interface PackageJson {
  name: string
  version: string
  description: string
}

export function isPackageJson(value: unknown): value is PackageJson {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'version' in value &&
    typeof value.version === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  )
}
