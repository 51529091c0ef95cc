export { assert, describe, test } from "./nodeTest.js";
export { approxEqual, assertApprox } from "./approx.js";
