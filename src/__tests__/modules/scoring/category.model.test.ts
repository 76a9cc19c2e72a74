import {
  CATEGORY_CODES,
  DEFAULT_CATEGORIES,
  createCategorySettings,
  isCategoryCode,
  isPercentageCategory,
} from '../../../modules/scoring/category.model';
import { ErrorCode, ValidationException } from '../../../utils/exceptions';

describe('category settings', () => {
  it('uses the nine default categories with turnovers counting against', () => {
    const settings = createCategorySettings();
    expect(settings.categories).toEqual(DEFAULT_CATEGORIES);
    expect(settings.categories).toHaveLength(9);
    expect(settings.countTurnoversNegative).toBe(true);
  });

  it('normalizes case and whitespace', () => {
    expect(createCategorySettings({ categories: [' pts', 'fg%'] }).categories).toEqual(['PTS', 'FG%']);
  });

  it('drops duplicates, keeping the first position', () => {
    expect(createCategorySettings({ categories: ['REB', 'PTS', 'reb'] }).categories).toEqual(['REB', 'PTS']);
  });

  it('copies and freezes the list', () => {
    const input = ['PTS', 'AST'];
    const settings = createCategorySettings({ categories: input });
    input.push('BLK');
    expect(settings.categories).toEqual(['PTS', 'AST']);
    expect(Object.isFrozen(settings.categories)).toBe(true);
  });

  it('rejects an unknown code', () => {
    expect(() => createCategorySettings({ categories: ['PTS', 'DUNKS'] })).toThrow('Unknown stat category: DUNKS');
  });

  it('tags unknown codes with INVALID_CATEGORY', () => {
    let caught: unknown;
    try {
      createCategorySettings({ categories: ['XYZ'] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationException);
    expect(caught).toMatchObject({ errorCode: ErrorCode.INVALID_CATEGORY });
  });

  it('can count turnovers like any other stat', () => {
    expect(createCategorySettings({ countTurnoversNegative: false }).countTurnoversNegative).toBe(false);
  });

  it('knows the fourteen codes and which are percentages', () => {
    expect(CATEGORY_CODES).toHaveLength(14);
    expect(isCategoryCode('3PM')).toBe(true);
    expect(isCategoryCode('pts')).toBe(false);
    expect(CATEGORY_CODES.filter(isPercentageCategory)).toEqual(['FG%', '3P%', 'FT%']);
  });
});
