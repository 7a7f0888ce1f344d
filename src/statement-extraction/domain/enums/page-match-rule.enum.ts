export enum PageMatchRule {
  EXPLICIT_STANDALONE = 'explicit-standalone',
  GENERIC = 'generic',
}
