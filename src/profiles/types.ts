// src/profiles/types.ts
export type Profile = 'java' | 'python' | 'js' | 'all'

export const PROFILES: readonly Profile[] = ['java', 'python', 'js', 'all']

export const PROFILE_EXTENSIONS: Record<Profile, ReadonlySet<string>> = {
  java: new Set(['.java', '.kt', '.groovy', '.gradle', '.xml', '.properties', '.yml', '.yaml', '.md', '.txt']),
  python: new Set(['.py', '.pyi', '.toml', '.ini', '.cfg', '.yml', '.yaml', '.md', '.txt']),
  js: new Set(['.js', '.jsx', '.ts', '.tsx', '.json', '.css', '.scss', '.html', '.md', '.txt', '.yml', '.yaml']),
  all: new Set()
}

export function isProfile(value: string): value is Profile {
  return (PROFILES as readonly string[]).includes(value)
}
