import { PidSelection } from '../catalog/PidSelection';
import { InterestRegistry } from './InterestRegistry';

/**
 * Registers a consumer whose interest follows the enabled gauges. The returned
 * function detaches it and clears its token.
 */
export function bindSelectionToInterest(selection: PidSelection, registry: InterestRegistry): () => void {
  const token = registry.makeToken();
  const sync = () => registry.replace(selection.enabledGauges().map((definition) => definition.id), token);

  sync();
  const unsubscribe = selection.subscribe(sync);

  return () => {
    unsubscribe();
    registry.clear(token);
  };
}
