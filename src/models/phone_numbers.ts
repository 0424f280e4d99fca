export type PhoneNumberDirectory = Record<string, string[]>;

/** Validates a parsed phone number file: region codes mapped to lists of dial-in numbers. */
export function parsePhoneNumberDirectory(raw: unknown): PhoneNumberDirectory {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error("Phone number list must be an object mapping regions to number arrays");
  }

  const directory: PhoneNumberDirectory = {};
  for (const [region, numbers] of Object.entries(raw)) {
    if (!Array.isArray(numbers) || !numbers.every((n): n is string => typeof n === "string")) {
      throw new Error(`Phone numbers for region "${region}" must be an array of strings`);
    }
    directory[region] = [...numbers];
  }
  return directory;
}
