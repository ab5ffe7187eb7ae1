// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { Serializable, Serialized } from "../../bcs";
import { MoveFunction, MoveFunctionId, MoveModule, MoveModuleId } from "../../types";
import { EntryFunction, ViewFunctionPayload } from "../types/transactionPayload";
import { TypeTag, TypeTagReference, TypeTagSigner } from "../types/typeTag";
import { parseTypeTag } from "../types/typeTagParser";
import { ArgumentInvalidError, ArgumentInvalidReason, convertArgs } from "./builder_utils";
import { EntryFunctionData, MoveArgumentValue, TypeArgument, ViewFunctionData } from "./types";

type BoundFunction = {
  moduleId: MoveModuleId;
  functionName: string;
  typeArgs: Array<TypeTag>;
  args: Array<Serializable>;
};

/**
 * Splits `0x1::coin::transfer` into its module id and function name.
 */
export function getFunctionParts(functionId: MoveFunctionId): { moduleId: MoveModuleId; functionName: string } {
  const parts = functionId.split("::");
  if (parts.length !== 3) {
    throw new Error(`Invalid function id '${functionId}', expected address::module::function`);
  }
  return { moduleId: `${parts[0]}::${parts[1]}`, functionName: parts[2] };
}

export function standardizeTypeTags(typeArguments: ReadonlyArray<TypeArgument>): Array<TypeTag> {
  return typeArguments.map((typeArg) =>
    typeof typeArg === "string" ? parseTypeTag(typeArg, { allowGenerics: false }) : typeArg,
  );
}

function isSigner(typeTag: TypeTag): boolean {
  return (
    typeTag instanceof TypeTagSigner ||
    (typeTag instanceof TypeTagReference && typeTag.value instanceof TypeTagSigner)
  );
}

function findFunction(abi: MoveModule | MoveFunction, functionName: string): MoveFunction {
  if (!("exposed_functions" in abi)) {
    if (abi.name !== functionName) {
      throw new Error(`ABI is for function '${abi.name}', not '${functionName}'`);
    }
    return abi;
  }
  const found = abi.exposed_functions.find((fn) => fn.name === functionName);
  if (found === undefined) {
    throw new Error(`Function '${functionName}' not found in module ${abi.address}::${abi.name}`);
  }
  return found;
}

/**
 * Arguments given without an ABI must be typed already.
 */
function preEncodedArguments(functionArguments: ReadonlyArray<MoveArgumentValue>): Array<Serializable> {
  return functionArguments.map((arg, i) => {
    if (arg instanceof Serializable) {
      return arg;
    }
    if (arg instanceof Uint8Array) {
      return new Serialized(arg);
    }
    throw new ArgumentInvalidError(
      `Argument ${i} must be a Serializable or BCS bytes when no ABI is given`,
      ArgumentInvalidReason.WRONG_TYPE,
    );
  });
}

function bindFunction(data: EntryFunctionData | ViewFunctionData, kind: "entry" | "view"): BoundFunction {
  const { moduleId, functionName } = getFunctionParts(data.function);
  const typeArgs = standardizeTypeTags(data.typeArguments ?? []);

  if (data.abi === undefined) {
    return { moduleId, functionName, typeArgs, args: preEncodedArguments(data.functionArguments) };
  }

  const fn = findFunction(data.abi, functionName);
  if (kind === "entry" && !fn.is_entry) {
    throw new Error(`'${data.function}' is not an entry function`);
  }
  if (kind === "view" && !fn.is_view) {
    throw new Error(`'${data.function}' is not a view function`);
  }

  if (typeArgs.length !== fn.generic_type_params.length) {
    throw new ArgumentInvalidError(
      `'${data.function}' takes ${fn.generic_type_params.length} type arguments, got ${typeArgs.length}`,
      ArgumentInvalidReason.ARITY_MISMATCH,
    );
  }

  const params = fn.params.map((param) => parseTypeTag(param, { allowGenerics: true }));
  let firstNonSigner = 0;
  while (firstNonSigner < params.length && isSigner(params[firstNonSigner])) {
    firstNonSigner += 1;
  }
  const argTypes = params.slice(firstNonSigner);

  if (data.functionArguments.length !== argTypes.length) {
    throw new ArgumentInvalidError(
      `'${data.function}' takes ${argTypes.length} arguments, got ${data.functionArguments.length}`,
      ArgumentInvalidReason.ARITY_MISMATCH,
    );
  }

  const encoded = convertArgs(data.functionArguments, argTypes, {
    generics: typeArgs,
    compatibilityMode: data.compatibilityMode,
  });
  return { moduleId, functionName, typeArgs, args: encoded.map((bytes) => new Serialized(bytes)) };
}

/**
 * Builds an entry function call, encoding each argument by the parameter type in the ABI.
 * Leading `signer` and `&signer` parameters are filled by the transaction's signers and
 * take no argument.
 */
export function entryFunctionFromAbi(data: EntryFunctionData): EntryFunction {
  const { moduleId, functionName, typeArgs, args } = bindFunction(data, "entry");
  return EntryFunction.build(moduleId, functionName, typeArgs, args);
}

/**
 * The BCS body of a view request.
 */
export function viewFunctionPayload(data: ViewFunctionData): ViewFunctionPayload {
  const { moduleId, functionName, typeArgs, args } = bindFunction(data, "view");
  const entryFunction = EntryFunction.build(moduleId, functionName, typeArgs, args);
  return new ViewFunctionPayload(
    entryFunction.moduleId,
    entryFunction.functionName,
    entryFunction.typeArgs,
    entryFunction.args,
  );
}
