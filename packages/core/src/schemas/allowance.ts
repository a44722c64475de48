/**
 * Allowance and financial metrics — GET/POST /renter.
 * Currency amounts travel as base-10 strings.
 */

import { Type, type Static } from "@sinclair/typebox";

export const CurrencyString = Type.String({ pattern: "^[0-9]+$" });

export const AllowanceV1 = Type.Object(
  {
    funds: CurrencyString,
    hosts: Type.Integer({ minimum: 0 }),
    period: Type.Integer({ minimum: 0 }),
    renewwindow: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type AllowanceV1 = Static<typeof AllowanceV1>;

export const FinancialMetricsV1 = Type.Object(
  {
    contractspending: CurrencyString,
    downloadspending: CurrencyString,
    storagespending: CurrencyString,
    uploadspending: CurrencyString,
    unspent: CurrencyString,
  },
  { additionalProperties: false },
);

export type FinancialMetricsV1 = Static<typeof FinancialMetricsV1>;

export const RenterGetV1 = Type.Object({
  settings: Type.Object({ allowance: AllowanceV1 }),
  financialmetrics: FinancialMetricsV1,
});

export type RenterGetV1 = Static<typeof RenterGetV1>;

/** POST /renter body. Every field is a raw string, parsed by the validator. */
export const SetSettingsBody = Type.Object({
  funds: Type.String(),
  hosts: Type.Optional(Type.String()),
  period: Type.String(),
  renewwindow: Type.Optional(Type.String()),
});

export type SetSettingsBody = Static<typeof SetSettingsBody>;
