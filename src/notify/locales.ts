import type { Language } from '../core/config.js';

export interface LocaleStrings {
  gapTitle: string;
  moveUpTitle: string;
  moveDownTitle: string;
  newsTitle: string;
  correlationTitle: string;
  mover: string;
  laggard: string;
  linkedBy: string;
  startupTitle: string;
  heartbeatTitle: string;
  digestTitle: string;
  gap: string;
  higherOn: (platform: string) => string;
  titleMatch: string;
  before: string;
  now: string;
  change: string;
  minutes: (count: number) => string;
  source: string;
  category: string;
  keywords: string;
  status: string;
  active: string;
  markets: string;
  pairs: string;
  interval: string;
  threshold: string;
  cooldown: string;
  languages: string;
  feeds: string;
  cycles: string;
  lastScan: string;
  noMarkets: string;
}

export const LOCALES: Record<Language, LocaleStrings> = {
  en: {
    gapTitle: 'Cross-platform gap',
    moveUpTitle: 'Big move up',
    moveDownTitle: 'Big move down',
    newsTitle: 'Market-relevant news',
    correlationTitle: 'Correlation anomaly',
    mover: 'Moved',
    laggard: 'Did not react',
    linkedBy: 'Linked by',
    startupTitle: 'Market monitor started',
    heartbeatTitle: 'Still watching',
    digestTitle: 'Market digest',
    gap: 'Gap',
    higherOn: (platform) => `${platform} higher`,
    titleMatch: 'Title match',
    before: 'Before',
    now: 'Now',
    change: 'Change',
    minutes: (count) => `over ${count} min`,
    source: 'Source',
    category: 'Category',
    keywords: 'Keywords',
    status: 'Status',
    active: 'active',
    markets: 'Markets tracked',
    pairs: 'Matched pairs',
    interval: 'Scan interval',
    threshold: 'Alert threshold',
    cooldown: 'Cooldown',
    languages: 'Languages',
    feeds: 'News feeds',
    cycles: 'Cycles completed',
    lastScan: 'Last scan',
    noMarkets: 'No markets tracked right now.',
  },
  he: {
    gapTitle: 'פער בין פלטפורמות',
    moveUpTitle: 'תנועה גדולה למעלה',
    moveDownTitle: 'תנועה גדולה למטה',
    newsTitle: 'חדשות רלוונטיות לשווקים',
    correlationTitle: 'אנומליית קורלציה',
    mover: 'שוק שזז',
    laggard: 'שוק שלא הגיב',
    linkedBy: 'קשר',
    startupTitle: 'ניטור השווקים הופעל',
    heartbeatTitle: 'עדיין עוקב',
    digestTitle: 'מצב שווקים',
    gap: 'פער',
    higherOn: (platform) => `גבוה יותר ב-${platform}`,
    titleMatch: 'התאמת כותרת',
    before: 'לפני',
    now: 'עכשיו',
    change: 'שינוי',
    minutes: (count) => `תוך ${count} דקות`,
    source: 'מקור',
    category: 'קטגוריה',
    keywords: 'מילות מפתח',
    status: 'מצב',
    active: 'פעיל',
    markets: 'שווקים במעקב',
    pairs: 'זוגות מותאמים',
    interval: 'תדירות סריקה',
    threshold: 'סף התראה',
    cooldown: 'זמן המתנה',
    languages: 'שפות',
    feeds: 'מקורות חדשות',
    cycles: 'סבבים שהושלמו',
    lastScan: 'סריקה אחרונה',
    noMarkets: 'אין כרגע שווקים במעקב.',
  },
  fr: {
    gapTitle: 'Écart entre plateformes',
    moveUpTitle: 'Forte hausse',
    moveDownTitle: 'Forte baisse',
    newsTitle: 'Actualité pertinente pour les marchés',
    correlationTitle: 'Anomalie de corrélation',
    mover: 'A bougé',
    laggard: "N'a pas réagi",
    linkedBy: 'Lien',
    startupTitle: 'Surveillance des marchés démarrée',
    heartbeatTitle: 'Toujours en veille',
    digestTitle: 'Résumé des marchés',
    gap: 'Écart',
    higherOn: (platform) => `plus haut sur ${platform}`,
    titleMatch: 'Correspondance du titre',
    before: 'Avant',
    now: 'Maintenant',
    change: 'Variation',
    minutes: (count) => `en ${count} min`,
    source: 'Source',
    category: 'Catégorie',
    keywords: 'Mots-clés',
    status: 'État',
    active: 'actif',
    markets: 'Marchés suivis',
    pairs: 'Paires appariées',
    interval: 'Intervalle de scan',
    threshold: "Seuil d'alerte",
    cooldown: 'Délai de relance',
    languages: 'Langues',
    feeds: "Flux d'actualité",
    cycles: 'Cycles terminés',
    lastScan: 'Dernier scan',
    noMarkets: 'Aucun marché suivi pour le moment.',
  },
};
