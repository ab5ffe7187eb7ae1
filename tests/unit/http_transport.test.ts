// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import aptosClient from "@aptos-labs/aptos-client";
import { HttpTransport } from "../../src/api/http_transport";
import { ApiError } from "../../src/client/types";
import { AccountAddress } from "../../src/core/account_address";
import { FailedTransactionError, WaitForTransactionError } from "../../src/internal/transaction";
import { viewFunctionPayload } from "../../src/transactions/transaction_builder/function_abi";
import { MimeType, MoveModule } from "../../src/types";
import { makeLogger } from "../../src/utils/logger";
import { VERSION } from "../../src/version";

jest.mock("@aptos-labs/aptos-client", () => ({ __esModule: true, default: jest.fn() }));

const mockedClient = jest.mocked(aptosClient);

const FULLNODE = "http://node.test/v1";

const respond = (status: number, data: unknown) =>
  mockedClient.mockResolvedValueOnce({ status, statusText: String(status), data });

const requestAt = (call: number) => mockedClient.mock.calls[call][0];

const newTransport = (settings: { chainId?: number; token?: string } = {}) =>
  new HttpTransport({
    fullnode: `${FULLNODE}/`,
    chainId: settings.chainId,
    clientConfig: settings.token === undefined ? undefined : { TOKEN: settings.token, HEADERS: { "x-trace": 1 } },
    logger: makeLogger("silent"),
  });

const committed = (success: boolean) => ({
  type: "user_transaction",
  hash: "0xabc",
  version: "10",
  success,
  vm_status: success ? "Executed successfully" : "Move abort",
  gas_used: "5",
});

const pending = { type: "pending_transaction", hash: "0xabc", sender: "0x1", sequence_number: "0" };

beforeEach(() => {
  mockedClient.mockReset();
});

describe("HttpTransport", () => {
  describe("getChainId", () => {
    it("reads the ledger info once", async () => {
      respond(200, { chain_id: 4, epoch: "1", ledger_version: "2", ledger_timestamp: "3", block_height: "4" });
      const transport = newTransport();
      await expect(transport.getChainId()).resolves.toEqual(4);
      await expect(transport.getChainId()).resolves.toEqual(4);

      expect(mockedClient).toHaveBeenCalledTimes(1);
      const request = requestAt(0);
      expect(request.url).toEqual(FULLNODE);
      expect(request.method).toEqual("GET");
      expect(request.headers).toEqual({
        "x-aptos-client": `move-txn-core/${VERSION}`,
        "content-type": MimeType.JSON,
      });
    });

    it("uses the configured chain id", async () => {
      const transport = newTransport({ chainId: 2 });
      await expect(transport.getChainId()).resolves.toEqual(2);
      expect(mockedClient).not.toHaveBeenCalled();
    });

    it("fetches again after a failure", async () => {
      respond(503, { message: "unavailable" });
      respond(200, { chain_id: 4 });
      const transport = newTransport();
      await expect(transport.getChainId()).rejects.toThrow("Service Unavailable");
      await expect(transport.getChainId()).resolves.toEqual(4);
    });
  });

  it("exposes the configured transaction defaults", () => {
    const transport = new HttpTransport({ fullnode: FULLNODE, transactionDefaults: { gasUnitPrice: 150 } });
    expect(transport.transactionDefaults).toEqual({ gasUnitPrice: 150 });
    expect(newTransport().transactionDefaults).toEqual({});
  });

  describe("getSequenceNumber", () => {
    it("reads the account", async () => {
      respond(200, { sequence_number: "12", authentication_key: "0x1" });
      await expect(newTransport().getSequenceNumber(AccountAddress.ONE)).resolves.toEqual(12n);
      expect(requestAt(0).url).toEqual(`${FULLNODE}/accounts/0x${"0".repeat(63)}1`);
    });

    it("starts an unknown account at zero", async () => {
      respond(404, { message: "account not found" });
      await expect(newTransport().getSequenceNumber(AccountAddress.ONE)).resolves.toEqual(0n);
    });

    it("raises other errors with the response", async () => {
      respond(500, { message: "boom" });
      const error = await newTransport()
        .getSequenceNumber(AccountAddress.ONE)
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.status).toEqual(500);
        expect(error.message).toEqual("Internal Server Error");
        expect(error.data).toEqual({ message: "boom" });
        expect(error.url).toEqual(`${FULLNODE}/accounts/0x${"0".repeat(63)}1`);
      }
    });

    it("sends the token and custom headers", async () => {
      respond(200, { sequence_number: "0", authentication_key: "0x1" });
      await newTransport({ token: "test-secret" }).getSequenceNumber(AccountAddress.ONE);
      expect(requestAt(0).headers).toEqual({
        "x-trace": "1",
        "x-aptos-client": `move-txn-core/${VERSION}`,
        "content-type": MimeType.JSON,
        Authorization: "Bearer test-secret",
      });
    });
  });

  describe("submitSignedTransaction", () => {
    it("posts the BCS bytes and returns the hash", async () => {
      respond(202, pending);
      const body = new Uint8Array([1, 2, 3]);
      await expect(newTransport().submitSignedTransaction(body)).resolves.toEqual("0xabc");

      const request = requestAt(0);
      expect(request.url).toEqual(`${FULLNODE}/transactions`);
      expect(request.method).toEqual("POST");
      expect(request.body).toBe(body);
      expect(request.headers).toEqual({
        "x-aptos-client": `move-txn-core/${VERSION}`,
        "content-type": MimeType.BCS_SIGNED_TRANSACTION,
        accept: MimeType.JSON,
      });
    });

    it("raises a rejected transaction", async () => {
      respond(400, { message: "invalid transaction" });
      await expect(newTransport().submitSignedTransaction(new Uint8Array([1]))).rejects.toThrow("Bad Request");
    });
  });

  describe("waitForTransaction", () => {
    it("returns the committed transaction", async () => {
      respond(200, committed(true));
      await expect(newTransport().waitForTransaction("0xabc")).resolves.toEqual(committed(true));
      expect(requestAt(0).url).toEqual(`${FULLNODE}/transactions/wait_by_hash/0xabc`);
    });

    it("polls while the transaction is pending", async () => {
      respond(200, pending);
      respond(200, committed(true));
      await expect(newTransport().waitForTransaction("0xabc")).resolves.toEqual(committed(true));
      expect(requestAt(1).url).toEqual(`${FULLNODE}/transactions/by_hash/0xabc`);
    });

    it("keeps polling while the node does not know the transaction", async () => {
      respond(404, { message: "not found" });
      respond(200, committed(true));
      await expect(newTransport().waitForTransaction("0xabc")).resolves.toEqual(committed(true));
      expect(mockedClient).toHaveBeenCalledTimes(2);
    });

    it("raises a failed transaction", async () => {
      respond(200, committed(false));
      const error = await newTransport()
        .waitForTransaction("0xabc")
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(FailedTransactionError);
      if (error instanceof FailedTransactionError) {
        expect(error.message).toEqual("Transaction 0xabc failed with an error: Move abort");
      }
    });

    it("returns a failed transaction when not checking success", async () => {
      respond(200, committed(false));
      await expect(newTransport().waitForTransaction("0xabc", { checkSuccess: false })).resolves.toEqual(
        committed(false),
      );
    });

    it("times out on a pending transaction", async () => {
      respond(200, pending);
      const error = await newTransport()
        .waitForTransaction("0xabc", { timeoutSecs: 0 })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(WaitForTransactionError);
      if (error instanceof WaitForTransactionError) {
        expect(error.message).toEqual("Waiting for transaction 0xabc timed out after 0 seconds");
        expect(error.lastSubmittedTransaction).toEqual(pending);
      }
    });

    it("does not retry a client error", async () => {
      respond(400, { message: "bad hash" });
      await expect(newTransport().waitForTransaction("0xabc")).rejects.toThrow(ApiError);
      expect(mockedClient).toHaveBeenCalledTimes(1);
    });
  });

  describe("view", () => {
    const balanceAbi: MoveModule = {
      address: "0x1",
      name: "coin",
      friends: [],
      exposed_functions: [
        {
          name: "balance",
          visibility: "public",
          is_entry: false,
          is_view: true,
          generic_type_params: [{ constraints: [] }],
          params: ["address"],
          return: ["u64"],
        },
      ],
    };

    it("posts the BCS view request", async () => {
      respond(200, ["100"]);
      const payload = viewFunctionPayload({
        function: "0x1::coin::balance",
        typeArguments: ["0x1::aptos_coin::AptosCoin"],
        functionArguments: ["0x1"],
        abi: balanceAbi,
      });
      await expect(newTransport().view(payload, 5)).resolves.toEqual(["100"]);

      const request = requestAt(0);
      expect(request.url).toEqual(`${FULLNODE}/view`);
      expect(request.params).toEqual({ ledger_version: "5" });
      expect(request.body).toEqual(payload.bcsToBytes());
      expect(request.headers?.["content-type"]).toEqual(MimeType.BCS_VIEW_FUNCTION);
    });

    it("rejects a function that is not a view function", () => {
      expect(() =>
        viewFunctionPayload({
          function: "0x1::coin::balance",
          functionArguments: ["0x1"],
          abi: { ...balanceAbi.exposed_functions[0], is_view: false },
        }),
      ).toThrow("'0x1::coin::balance' is not a view function");
    });
  });

  describe("getModuleAbi", () => {
    it("returns the module ABI", async () => {
      const abi: MoveModule = { address: "0x1", name: "coin", friends: [], exposed_functions: [] };
      respond(200, { bytecode: "0x00", abi });
      await expect(newTransport().getModuleAbi("0x1::coin")).resolves.toEqual(abi);
      expect(requestAt(0).url).toEqual(`${FULLNODE}/accounts/0x${"0".repeat(63)}1/module/coin`);
    });

    it("raises when the node returns no ABI", async () => {
      respond(200, { bytecode: "0x00" });
      await expect(newTransport().getModuleAbi("0x1::coin")).rejects.toThrow(
        "The node returned no ABI for module 0x1::coin",
      );
    });
  });
});
