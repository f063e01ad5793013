export { createRng, type Rng } from "./rng.js";
export { createDeferred, flushAsync, waitFor, type Deferred } from "./async.js";
export { assert, describe, test } from "./nodeTest.js";
