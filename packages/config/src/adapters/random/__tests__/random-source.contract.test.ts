import { describePropertySourceContract } from "../../../ports/__tests__/property-source.contract"
import { RandomSource } from "../random-source"

describePropertySourceContract({
  name: "RandomSource",
  make: () => new RandomSource(),
  expected: () => ({
    "random.u8": /^\d+$/,
    "random.i64": /^-?\d+$/,
  }),
})
