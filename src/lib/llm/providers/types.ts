export interface ProviderResult {
  text: string
  tokensIn: number
  tokensOut: number
  raw: unknown
}
