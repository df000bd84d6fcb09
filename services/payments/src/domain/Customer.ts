import { Schema } from "effect"

export class ContactInfo extends Schema.Class<ContactInfo>("ContactInfo")({
  email: Schema.optional(Schema.String),
  phone: Schema.optional(Schema.String)
}) {}

// contactInfo is optional here so the validator can report it missing;
// the façade never charges a customer without it.
export class CustomerData extends Schema.Class<CustomerData>("CustomerData")({
  name: Schema.String,
  contactInfo: Schema.optional(ContactInfo),
  // Gateway-side identifier, assigned after the first successful charge
  id: Schema.optional(Schema.String)
}) {}
