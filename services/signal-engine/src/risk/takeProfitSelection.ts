import { TpSelection } from './riskProfiles';

/**
 * Take profits kept under the profile's selection policy. Never returns an
 * empty list for a non-empty input; the first TP is the floor.
 */
export function selectTakeProfits(takeProfits: readonly number[], selection: TpSelection): number[] {
  if (takeProfits.length === 0) {
    return [];
  }

  let selected: number[];
  switch (selection.mode) {
    case 'first_only':
      selected = takeProfits.slice(0, 1);
      break;
    case 'first_two':
      selected = takeProfits.slice(0, 2);
      break;
    case 'custom': {
      const indices = Array.from(new Set(selection.custom_selection))
        .filter(index => index >= 1 && index <= takeProfits.length)
        .sort((a, b) => a - b);
      selected = indices.map(index => takeProfits[index - 1]);
      break;
    }
    default:
      selected = [...takeProfits];
  }

  return selected.length > 0 ? selected : [takeProfits[0]];
}
