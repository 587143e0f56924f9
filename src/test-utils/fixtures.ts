import { createDoctor } from "../services/directory.ts";
import { registerPatient } from "../services/identity.ts";
import type { Principal, ServiceContext } from "../services/context.ts";

export const PATIENT_PASSWORD = "test-password";

export async function addDoctor(
  ctx: ServiceContext,
  fullName: string,
  specialization = "Cardiology",
): Promise<Principal> {
  const { doctor } = await createDoctor(ctx, { fullName, specialization, experienceYears: 5 });
  return { id: doctor.id, role: "doctor", username: doctor.username };
}

export async function addPatient(ctx: ServiceContext, username: string, fullName?: string): Promise<Principal> {
  return registerPatient(ctx, { username, password: PATIENT_PASSWORD, fullName });
}
