// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/* eslint-disable max-classes-per-file */
import { BcsError, BcsInvalidReason, Deserializer, Serializable, Serialized, Serializer } from "../../bcs";
import { AccountAddress } from "../../core";
import { Identifier } from "./identifier";
import { ScriptTransactionArgument } from "./scriptTransactionArguments";
import { ModuleId } from "./moduleId";
import { MoveModuleId, MultisigTransactionPayloadVariants, TransactionPayloadVariants } from "../../types";
import { TypeTag } from "./typeTag";

/**
 * What a transaction runs: a script, an entry function, or an entry function through
 * a multisig account.
 */
export abstract class TransactionPayload extends Serializable {
  abstract serialize(serializer: Serializer): void;

  /**
   * Module bundles (variant 1) are no longer accepted on chain and fail with
   * UNSUPPORTED_VARIANT.
   */
  static deserialize(deserializer: Deserializer): TransactionPayload {
    const index = deserializer.deserializeUleb128AsU32();
    switch (index) {
      case TransactionPayloadVariants.Script:
        return new TransactionPayloadScript(Script.deserialize(deserializer));
      case TransactionPayloadVariants.EntryFunction:
        return new TransactionPayloadEntryFunction(EntryFunction.deserialize(deserializer));
      case TransactionPayloadVariants.Multisig:
        return new TransactionPayloadMultisig(MultiSig.deserialize(deserializer));
      case TransactionPayloadVariants.ModuleBundle:
        throw deserializer.fail(
          new BcsError("Module bundle payloads are not supported", BcsInvalidReason.UNSUPPORTED_VARIANT),
        );
      default:
        throw deserializer.fail(
          new BcsError(`Unknown variant index for TransactionPayload: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
        );
    }
  }
}

export class TransactionPayloadScript extends TransactionPayload {
  constructor(public readonly script: Script) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionPayloadVariants.Script);
    serializer.serialize(this.script);
  }
}

export class TransactionPayloadEntryFunction extends TransactionPayload {
  constructor(public readonly entryFunction: EntryFunction) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionPayloadVariants.EntryFunction);
    serializer.serialize(this.entryFunction);
  }
}

export class TransactionPayloadMultisig extends TransactionPayload {
  constructor(public readonly multiSig: MultiSig) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(TransactionPayloadVariants.Multisig);
    serializer.serialize(this.multiSig);
  }
}

/**
 * A call to a Move entry function, such as
 * `0x1::coin::transfer<CoinType>(from: &signer, to: address, amount: u64)`.
 *
 * `args` leave out the leading signers. Each one goes on the wire as its own byte
 * vector: a `Serialized` argument as it is, anything else BCS encoded first.
 */
export class EntryFunction extends Serializable {
  constructor(
    public readonly moduleId: ModuleId,
    public readonly functionName: Identifier,
    public readonly typeArgs: Array<TypeTag>,
    public readonly args: Array<Serializable>,
  ) {
    super();
  }

  /**
   * @param moduleId e.g. "0x1::coin"
   * @param args a Uint8Array is taken as an argument that is already encoded
   */
  static build(
    moduleId: MoveModuleId,
    functionName: string,
    typeArgs: Array<TypeTag>,
    args: Array<Serializable | Uint8Array>,
  ): EntryFunction {
    return new EntryFunction(
      ModuleId.fromStr(moduleId),
      new Identifier(functionName),
      typeArgs,
      args.map((arg) => (arg instanceof Uint8Array ? new Serialized(arg) : arg)),
    );
  }

  serialize(serializer: Serializer): void {
    serializer.serialize(this.moduleId);
    serializer.serialize(this.functionName);
    serializer.serializeVector(this.typeArgs);
    serializer.serializeVectorWith(this.args, (s, arg) =>
      s.serializeBytes(arg instanceof Serialized ? arg.value : arg.bcsToBytes()),
    );
  }

  /**
   * Arguments come back as `Serialized`. Their types are not on the wire, so reading
   * them further takes the function's ABI.
   */
  static deserialize(deserializer: Deserializer): EntryFunction {
    return new EntryFunction(
      ModuleId.deserialize(deserializer),
      Identifier.deserialize(deserializer),
      deserializer.deserializeVector(TypeTag),
      deserializer.deserializeVector(Serialized),
    );
  }
}

// Body of a BCS view request: laid out like an entry function call.
export class ViewFunctionPayload extends EntryFunction {
  static deserialize(deserializer: Deserializer): ViewFunctionPayload {
    const { moduleId, functionName, typeArgs, args } = EntryFunction.deserialize(deserializer);
    return new ViewFunctionPayload(moduleId, functionName, typeArgs, args);
  }
}

export class Script extends Serializable {
  constructor(
    public readonly bytecode: Uint8Array,
    public readonly typeArgs: Array<TypeTag>,
    public readonly args: Array<ScriptTransactionArgument>,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeBytes(this.bytecode);
    serializer.serializeVector(this.typeArgs);
    serializer.serializeVector(this.args);
  }

  static deserialize(deserializer: Deserializer): Script {
    return new Script(
      deserializer.deserializeBytes(),
      deserializer.deserializeVector(TypeTag),
      deserializer.deserializeVector(ScriptTransactionArgument),
    );
  }
}

/**
 * An entry function run as `multisigAddress`. Without `payload` the chain executes the
 * payload already stored for the pending multisig transaction.
 */
export class MultiSig extends Serializable {
  constructor(
    public readonly multisigAddress: AccountAddress,
    public readonly payload?: MultiSigTransactionPayload,
  ) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serialize(this.multisigAddress);
    serializer.serializeOption(this.payload);
  }

  static deserialize(deserializer: Deserializer): MultiSig {
    const multisigAddress = AccountAddress.deserialize(deserializer);
    return new MultiSig(multisigAddress, deserializer.deserializeOption(MultiSigTransactionPayload));
  }
}

// Entry functions are the only variant.
export class MultiSigTransactionPayload extends Serializable {
  constructor(public readonly entryFunction: EntryFunction) {
    super();
  }

  serialize(serializer: Serializer): void {
    serializer.serializeU32AsUleb128(MultisigTransactionPayloadVariants.EntryFunction);
    serializer.serialize(this.entryFunction);
  }

  static deserialize(deserializer: Deserializer): MultiSigTransactionPayload {
    const index = deserializer.deserializeUleb128AsU32();
    if (index !== MultisigTransactionPayloadVariants.EntryFunction) {
      throw deserializer.fail(
        new BcsError(`Unknown variant index for MultiSigTransactionPayload: ${index}`, BcsInvalidReason.UNKNOWN_VARIANT),
      );
    }
    return new MultiSigTransactionPayload(EntryFunction.deserialize(deserializer));
  }
}
