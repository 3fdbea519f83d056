/**
 * Registered counterparty receiver address.
 *
 * One slot: a contract instance registers at most one counterparty.
 * Written only by an applied RegisterChain action; never deleted.
 */

import { z } from "zod";
import { Item } from "@ibc-gatekeeper/state";

export const REGISTERED_ADDRESS_KEY = "counterparty_receiver_address";

export const REGISTERED_ADDRESS = new Item(REGISTERED_ADDRESS_KEY, z.string().min(1));
