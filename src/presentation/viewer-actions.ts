export type ViewerAction =
  | 'next-section'
  | 'previous-section'
  | 'toggle-section'
  | 'collapse-all'
  | 'expand-all'
  | 'show-actions'
  | 'show-links'
  | 'quick-draft'
  | 'quick-open'
  | 'quick-play'
  | 'open-chart'
  | 'mail-draft'
  | 'line-down'
  | 'line-up'
  | 'page-down'
  | 'page-up'
  | 'scroll-top'
  | 'scroll-bottom'
  | 'quit';
