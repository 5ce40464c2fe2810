export const MPM_CONSTANTS = {
  FILE_EXTENSION: ".mpmdb",
  HEADER: ["index", "title", "username", "password"] as const,

  // AES-GCM with a synthetic (HMAC-derived) IV
  AES: {
    NAME: "AES-GCM" as const,
    LENGTH: 256 as const,
    IV_LENGTH: 12 as const, // 96-bit nonce
    TAG_LENGTH: 16 as const
  },

  HMAC: {
    NAME: "HMAC" as const,
    HASH: "SHA-256" as const
  },

  // Argon2id (argon2 uses KiB for memoryCost)
  ARGON2: {
    TIME_COST: 3,
    MEMORY_KIB: 64 * 1024,
    PARALLELISM: 1,
    MAX_TIME_COST: 64 as const,
    MIN_MEMORY_KIB: 1024 as const,
    // 32 bytes AES key + 32 bytes HMAC key
    HASH_LEN: 64 as const,
    // Fixed so that a cell encodes the same way on every run
    SALT: "magic-password-manager/cell-keys/v1"
  },

  GENERATOR: {
    MIN_LENGTH: 4,
    DEFAULT_LENGTH: 10,
    LOWERCASE: "abcdefghijklmnopqrstuvwxyz",
    UPPERCASE: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
    DIGITS: "0123456789",
    PUNCTUATION: "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~"
  },

  LOG: {
    MAX_ENTRIES: 500
  }
};
