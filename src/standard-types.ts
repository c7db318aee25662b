import { z } from "zod";
import { RelationType } from "./relation-type.js";
import { TimerType } from "./timer-type.js";

// General purpose relation types

export const NAME = new RelationType("NAME", z.string());

export const DESCRIPTION = new RelationType("DESCRIPTION", z.string());

/** Free-form information, e.g. for logging or display. */
export const INFO = new RelationType("INFO", z.string());

/** The milliseconds since the relation was first read. */
export const TIMER = new TimerType("TIMER");
