import { SeedSegmentListSchema } from '../schemas/prospect';
import type { SeedSegment } from '../types';

export const SEED_SEGMENTS: readonly SeedSegment[] = SeedSegmentListSchema.parse([
  {
    title: 'Plant-based meat alternative manufacturers',
    description: 'Burgers, nuggets, sausages, mince, schnitzel; established brands and private label'
  },
  {
    title: 'Protein and functional food manufacturers',
    description: 'Sports nutrition, shakes, bars, complete meals, RTD protein drinks'
  },
  {
    title: 'Dairy alternative manufacturers',
    description: 'Plant milks, yoghurts, cheese alternatives, ice cream'
  },
  {
    title: 'Snack and bakery manufacturers',
    description: 'Crisps, biscuits, bars, muesli/cereals, high-protein baked goods'
  },
  {
    title: 'Pet food manufacturers',
    description: 'Dog and cat food, premium and specialty feed'
  },
  {
    title: 'Contract manufacturers and co-packers (food/drinks)',
    description: 'Produce on behalf of brands; good for fast scale-up'
  },
  {
    title: 'Ready meal and convenience manufacturers',
    description: 'Bowls, soups, sauces, frozen food'
  },
  {
    title: 'B2B ingredient distributors',
    description: 'Multipliers for market entry; EU-wide and global'
  },
  {
    title: 'Medical and senior nutrition manufacturers',
    description: 'Clinical and senior nutrition, protein-enriched'
  },
  {
    title: 'Brands with packaging needs (packaging cross-sell)',
    description: 'Food and beverage brands that could also buy ingredients'
  }
]);
