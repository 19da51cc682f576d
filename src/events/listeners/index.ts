/**
 * Requires every listener module next to this file once at startup; each
 * one subscribes to its hooks as a side effect.
 */
import { autoRequireDirectory } from "../autoRequireDirectory";

autoRequireDirectory(__dirname, "listeners");
