export interface ActivityCatalogue {
  mild: string[];
  warm: string[];
  hot: string[];
  morning: string[];
  afternoon: string[];
  evening: string[];
}

export const activityCatalogue: ActivityCatalogue = {
  mild: ['Beach walk and photography', 'Visit Himchari National Park', 'Explore local markets'],
  warm: ['Swimming at Inani Beach', 'Visit Marine Drive', 'Surfing lessons', 'Jet skiing'],
  hot: [
    'Visit Aggmeda Khyang (Buddhist monastery)',
    'Indoor shopping at malls',
    'Enjoy fresh coconut water by the beach',
    'Take a boat ride',
  ],
  morning: ['Sunrise at Laboni Beach', 'Fresh seafood breakfast', 'Bird watching at wetlands'],
  afternoon: ['Lunch at beach restaurants', 'Visit Ramu Buddhist Temple', 'Shopping for local handicrafts'],
  evening: [
    "Sunset at Cox's Bazar beach",
    'Dinner with sea view',
    'Night market exploration',
    'Beach bonfire (if available)',
  ],
};
