import {
  hierarchicalBonus,
  scoreCategory,
  splitCategoryPath,
  suggestCategories,
} from '../categorySuggestions.js';

describe('category suggestions', () => {
  test('paths split on slash, pipe and angle bracket', () => {
    expect(splitCategoryPath('Gastro / Chladenie|Vitríny > Nerez')).toEqual(['Gastro', 'Chladenie', 'Vitríny', 'Nerez']);
  });

  test('hierarchy bonus counts leading matches and the leaf similarity', () => {
    expect(hierarchicalBonus('Chladenie|Vitríny', 'Chladenie > Vitríny')).toBeCloseTo(90);
    expect(hierarchicalBonus('Chladenie|Vitríny', 'Tovary > Chladenie > Vitríny')).toBeCloseTo(70);
    expect(hierarchicalBonus('', 'Stoly')).toBe(0);
  });

  test('an identical category scores 98', () => {
    expect(scoreCategory('Stoly', 'Stoly')).toBeCloseTo(98);
  });

  test('returns at most five suggestions, best first', () => {
    const known = [
      'Nábytok > Stoly',
      'Nábytok > Stoličky',
      'Chladenie > Vitríny',
      'Chladenie > Chladničky',
      'Varné zariadenia > Fritézy',
      'Varné zariadenia > Sporáky',
      'Umývanie > Umývačky riadu',
    ];

    const suggestions = suggestCategories('Chladenie/Vitríny', known);

    expect(suggestions).toHaveLength(5);
    expect(suggestions[0].category).toBe('Chladenie > Vitríny');
    const scores = suggestions.map(suggestion => suggestion.score);
    expect([...scores].sort((a, b) => b - a)).toEqual(scores);
  });

  test('no suggestions for a blank category', () => {
    expect(suggestCategories('  ', ['Stoly'])).toEqual([]);
  });
});
