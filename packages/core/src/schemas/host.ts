/**
 * Host directory entry — GET /renter/hosts/{active,all}.
 */

import { Type, type Static } from "@sinclair/typebox";
import { CurrencyString } from "./allowance.js";

export const HostEntryV1 = Type.Object(
  {
    netaddress: Type.String(),
    publickey: Type.String(),
    acceptingcontracts: Type.Boolean(),
    maxduration: Type.Integer({ minimum: 0 }),
    contractprice: CurrencyString,
    storageprice: CurrencyString,
    remainingstorage: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type HostEntryV1 = Static<typeof HostEntryV1>;
