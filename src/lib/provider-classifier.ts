/**
 * Cloud provider classifier
 *
 * Keyword detection over free text (repository names, commit messages).
 * Text can mention several providers, so the result is the set of every
 * match; callers authenticate with all of them rather than picking one.
 */

export type ProviderRules = Readonly<Record<string, readonly string[]>>

export const DEFAULT_PROVIDER_RULES: ProviderRules = {
  aws: ['aws', 'amazon', 'eks', 'ecr'],
  gcp: ['gcp', 'google', 'gke', 'gcloud'],
  azure: ['azure', 'aks', 'azurerm'],
  cloudflare: ['cloudflare', 'wrangler'],
  digitalocean: ['digitalocean', 'doctl'],
  hetzner: ['hetzner', 'hcloud']
}

/**
 * Lowercase word tokens: "infra-AWS_network [gcp]" → infra, aws, network, gcp
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)
}

/**
 * Providers whose keywords appear as whole words in any of the texts
 */
export function classifyProviders(
  texts: string | readonly string[],
  rules: ProviderRules = DEFAULT_PROVIDER_RULES
): Set<string> {
  const tokens = new Set((typeof texts === 'string' ? [texts] : texts).flatMap(tokenize))
  const matched = new Set<string>()

  for (const [provider, keywords] of Object.entries(rules)) {
    if (keywords.some(keyword => tokens.has(keyword.toLowerCase()))) {
      matched.add(provider)
    }
  }

  return matched
}
