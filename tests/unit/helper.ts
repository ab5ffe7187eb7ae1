// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-len */

// Fixed keys with the values they must produce. Messages are "hello world" as hex.
export const HELLO_WORLD = "0x68656c6c6f20776f726c64";

export const ed25519 = {
  privateKey: "0xc5338cd251c22daa8c9c9cc94f498cc8a5c7e1d2e75287a5dda91096fe64efa5",
  publicKey: "0xde19e5d1880cac87d57484ce9ed2e84cf0f9599f12e7cc3a52e4e7657a763f2c",
  // legacy scheme, so also the address
  authKey: "0x978c213990c4833df71548df7ce49d54c759d6b6d932de22b24d56060b7af2aa",
  address: "0x978c213990c4833df71548df7ce49d54c759d6b6d932de22b24d56060b7af2aa",
  message: HELLO_WORLD,
  signedMessage:
    "0x9e653d56a09247570bb174a389e85b9226abd5c403ea6c504b386626a145158cd4efd66fc5e071c0e19538a96a05ddbda24d3c51e1e6a9dacc6bb1ce775cce07",
};

// Ed25519 keys from the seeds 0x11.., 0x22.. and 0x33.., threshold 2. Keys 0 and 2 sign.
export const multiEd25519 = {
  publicKeys: [
    "0xd04ab232742bb4ab3a1368bd4615e4e6d0224ab71a016baf8520a332c9778737",
    "0xa09aa5f47a6759802ff955f8dc2d2a14a5c99d23be97f864127ff9383455a4f0",
    "0x17cb79fb2b4120f2b1ec65e4198d6e08b28e813feb01e4a400839b85e18080ce",
  ],
  seeds: ["11", "22", "33"].map((byte) => `0x${byte.repeat(32)}`),
  threshold: 2,
  publicKeyBytes:
    "0xd04ab232742bb4ab3a1368bd4615e4e6d0224ab71a016baf8520a332c9778737a09aa5f47a6759802ff955f8dc2d2a14a5c99d23be97f864127ff9383455a4f017cb79fb2b4120f2b1ec65e4198d6e08b28e813feb01e4a400839b85e18080ce02",
  authKey: "0x42d3a067f871adf376e26e4fad39f65b6710e79a47ea756856635d6529b52fe1",
  message: HELLO_WORLD,
  signatures: [
    "0xbe6bc1c26488a31fdb030ccd1546e0dcb6dd4ffbada797040deba21231ce894470f1aef38272fe4c77725e77945c6c3b67c6c16d29e2d3ccf4f30bf4374b0f08",
    "0xf8f456e657b2cb01db87c01ee7783e34b450623f29ab39d8fee38ebcc6b5b6f5f7fc2c4bdddc4d100148b72e5a2bcafc06945d84497acfef3a08c3f67b9b050d",
  ],
  signers: [0, 2],
  signatureBytes:
    "0xbe6bc1c26488a31fdb030ccd1546e0dcb6dd4ffbada797040deba21231ce894470f1aef38272fe4c77725e77945c6c3b67c6c16d29e2d3ccf4f30bf4374b0f08f8f456e657b2cb01db87c01ee7783e34b450623f29ab39d8fee38ebcc6b5b6f5f7fc2c4bdddc4d100148b72e5a2bcafc06945d84497acfef3a08c3f67b9b050da0000000",
};

// Signatures are over the SHA3-256 digest of the message.
export const secp256k1 = {
  privateKey: "0xd107155adf816a0a94c6db3c9489c13ad8a1eda7ada2e558ba3bfa47c020347e",
  publicKey:
    "0x04acdd16651b839c24665b7e2033b55225f384554949fef46c397b5275f37f6ee95554d70fb5d9f93c5831ebf695c7206e7477ce708f03ae9bb2862dc6c9e033ea",
  // SingleKey scheme over AnyPublicKey(key)
  authKey: "0x5792c985bc96f436270bd2a3c692210b09c7febb8889345ceefdbae4bacfe498",
  address: "0x5792c985bc96f436270bd2a3c692210b09c7febb8889345ceefdbae4bacfe498",
  message: HELLO_WORLD,
  signature:
    "0xd0d634e843b61339473b028105930ace022980708b2855954b977da09df84a770c0b68c29c8ca1b5409a5085b0ec263be80e433c83fcf6debb82f3447e71edca",
};
