export interface CampaignBrief {
  client: string;
  focus: string;
  regions: string;
  product: string;
}

export const DEFAULT_BRIEF: CampaignBrief = {
  client: 'a B2B ingredients and packaging supplier',
  focus: 'potential B2B buyers of pea protein (and other plant-based ingredients), with packaging cross-sell where it fits',
  regions: 'Europe/DACH first, then UK and global',
  product: 'pea protein'
};

export function systemRole(brief: CampaignBrief = DEFAULT_BRIEF): string {
  return `You are a B2B research and lead-generation analyst working for ${brief.client}.
Your task: find real, existing companies (B2B) in ${brief.regions} that are very likely to use ${brief.product} as an ingredient or are relevant customers for the supplier's ingredient and packaging portfolio.
Only output real company names (no invented or shop names) and never repeat a company.`;
}
