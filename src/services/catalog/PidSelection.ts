// Which catalog PIDs the user has enabled, and in what order (in memory only)

import { createStore, StoreApi } from 'zustand/vanilla';
import { ParameterId, normalizeParameterId } from '../../models/Parameter';
import { PidCatalog, PidDefinition } from './PidCatalog';

export interface SelectedPid {
  definition: PidDefinition;
  enabled: boolean;
}

interface SelectionState {
  // Enabled entries first, in display order, followed by disabled ones
  pids: SelectedPid[];
}

function partition(pids: SelectedPid[]): SelectedPid[] {
  return [...pids.filter((pid) => pid.enabled), ...pids.filter((pid) => !pid.enabled)];
}

export class PidSelection {
  private readonly store: StoreApi<SelectionState>;

  constructor(catalog: PidCatalog) {
    const initial = catalog.definitions.map((definition) => ({ definition, enabled: definition.enabled }));
    this.store = createStore<SelectionState>()(() => ({ pids: partition(initial) }));
  }

  get pids(): readonly SelectedPid[] {
    return this.store.getState().pids;
  }

  enabledGauges(): PidDefinition[] {
    return this.pids
      .filter((pid) => pid.enabled && pid.definition.kind === 'gauge')
      .map((pid) => pid.definition);
  }

  toggle(parameterId: ParameterId): boolean {
    const current = this.find(parameterId);
    if (!current) return false;
    return this.setEnabled(!current.enabled, parameterId);
  }

  /** Returns false for ids outside the catalog. A newly enabled PID goes to the end of the enabled list. */
  setEnabled(enabled: boolean, parameterId: ParameterId): boolean {
    const current = this.find(parameterId);
    if (!current) return false;
    if (current.enabled === enabled) return true;

    const others = this.pids.filter((pid) => pid !== current);
    const updated = { ...current, enabled };
    const enabledPids = others.filter((pid) => pid.enabled);
    const disabledPids = others.filter((pid) => !pid.enabled);
    // Sits at the boundary: last enabled entry, or first disabled one
    this.store.setState({ pids: [...enabledPids, updated, ...disabledPids] });
    return true;
  }

  /**
   * Moves one entry within the enabled subset. Offsets outside the subset are clamped.
   */
  moveEnabled(fromOffset: number, toOffset: number): void {
    const enabled = this.pids.filter((pid) => pid.enabled);
    const disabled = this.pids.filter((pid) => !pid.enabled);
    if (fromOffset < 0 || fromOffset >= enabled.length) return;

    const [moved] = enabled.splice(fromOffset, 1);
    const target = Math.max(0, Math.min(toOffset, enabled.length));
    enabled.splice(target, 0, moved);
    this.store.setState({ pids: [...enabled, ...disabled] });
  }

  subscribe(listener: (pids: readonly SelectedPid[]) => void): () => void {
    return this.store.subscribe((state, previous) => {
      if (state.pids !== previous.pids) listener(state.pids);
    });
  }

  private find(parameterId: ParameterId): SelectedPid | undefined {
    const id = normalizeParameterId(parameterId);
    return this.pids.find((pid) => pid.definition.id === id);
  }
}
