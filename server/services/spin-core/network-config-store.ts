import { fail, type SpinCoreResult, type TNetworkCapacity, type TNetworkConfig } from "@shared/spin-core";
import { DEFAULT_NETWORK_CONFIG } from "@shared/spin-core-constants";
import { DEFAULT_CONDUIT_PARAMS, networkCapacity, type ConduitParams } from "./energy-model";

const isPositiveInt = (value: number): boolean => Number.isInteger(value) && value > 0;

export const validateNetworkConfig = (
  length: number,
  num: number,
  active: number,
): SpinCoreResult<{ config: TNetworkConfig }> => {
  if (!isPositiveInt(length)) {
    return fail("InvalidConfig", `conduit_length_m must be a positive integer (got ${length})`);
  }
  if (!isPositiveInt(num)) {
    return fail("InvalidConfig", `num_conduits must be a positive integer (got ${num})`);
  }
  if (!isPositiveInt(active) || active > num) {
    return fail("InvalidConfig", `active_conduits must be an integer in [1, ${num}] (got ${active})`);
  }
  return {
    ok: true,
    config: { conduit_length_m: length, num_conduits: num, active_conduits: active },
  };
};

export class NetworkConfigStore {
  private config: TNetworkConfig;

  constructor(
    initial: TNetworkConfig = { ...DEFAULT_NETWORK_CONFIG },
    private readonly params: ConduitParams = DEFAULT_CONDUIT_PARAMS,
  ) {
    const checked = validateNetworkConfig(initial.conduit_length_m, initial.num_conduits, initial.active_conduits);
    if (!checked.ok) {
      throw new Error(`invalid initial network config: ${checked.message}`);
    }
    this.config = checked.config;
  }

  get(): TNetworkConfig {
    return { ...this.config };
  }

  capacity(): TNetworkCapacity {
    return networkCapacity(this.config, this.params);
  }

  /** Replace the whole config; on failure the stored config is untouched. */
  update(length: number, num: number, active: number): SpinCoreResult<{ capacity: TNetworkCapacity }> {
    const checked = validateNetworkConfig(length, num, active);
    if (!checked.ok) return checked;
    const capacity = networkCapacity(checked.config, this.params);
    this.config = checked.config;
    return { ok: true, capacity };
  }
}
