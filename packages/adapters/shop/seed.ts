/**
 * Sample catalog loaded when no other data is supplied.
 */

import type { Flower, RecommendationPreset } from '@petal/core/ports';

export const SAMPLE_FLOWERS: readonly Flower[] = [
  {
    id: 1,
    name: 'Classic Roses',
    description: 'Fifteen red roses',
    price: 2500,
    category: 'roses',
    available: true,
  },
  {
    id: 2,
    name: 'Tulip Mix',
    description: 'Twenty-five tulips in mixed colours',
    price: 1800,
    category: 'tulips',
    available: true,
  },
  {
    id: 3,
    name: 'Gentle Peonies',
    description: 'Seven pink peonies',
    price: 3200,
    category: 'peonies',
    available: true,
  },
  {
    id: 4,
    name: 'Birthday Bouquet',
    description: 'Bright mix of roses, chrysanthemums and alstroemerias',
    price: 2000,
    category: 'mixed',
    available: true,
  },
  {
    id: 5,
    name: 'White Chrysanthemums',
    description: 'Mono bouquet of white chrysanthemums',
    price: 1500,
    category: 'chrysanthemums',
    available: true,
  },
];

export const SAMPLE_PRESETS: readonly RecommendationPreset[] = [
  {
    id: 'birthday',
    title: '🎂 Birthday',
    occasion: 'birthday',
    flowerId: 4,
    note: 'A bright mix that suits any birthday.',
  },
  {
    id: 'romance',
    title: '❤️ Romance',
    occasion: 'romantic date',
    flowerId: 1,
    note: 'Red roses never miss on a date.',
  },
  {
    id: 'spring',
    title: '🌷 Spring mood',
    occasion: 'just because',
    flowerId: 2,
    note: 'Tulips bring spring indoors.',
  },
  {
    id: 'tender',
    title: '🌸 Tender',
    occasion: 'thank you',
    flowerId: 3,
    note: 'Soft peonies for a gentle thank you.',
  },
];
