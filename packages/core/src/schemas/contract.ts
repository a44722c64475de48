import { Type, type Static } from "@sinclair/typebox";
import { CurrencyString } from "./allowance.js";

export const RenterContractV1 = Type.Object(
  {
    endheight: Type.Integer({ minimum: 0 }),
    id: Type.String(),
    netaddress: Type.String(),
    renterfunds: CurrencyString,
    /** Bytes: sector size × merkle root count. */
    size: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type RenterContractV1 = Static<typeof RenterContractV1>;
