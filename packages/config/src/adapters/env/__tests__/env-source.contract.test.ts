import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: () => new EnvSource({ env: { REDIS_DB: "2" } }),
  expectedValue: { REDIS_DB: "2" },
})
