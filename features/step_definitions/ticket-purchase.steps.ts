import { Given, When, Then, Before } from '@cucumber/cucumber';
import { strict as assert } from 'assert';
import { pino } from 'pino';
import { TicketServiceImpl } from '../../src/ticket-service.js';
import { TicketTypeRequest, isTicketType } from '../../src/ticket-type-request.js';
import { InvalidPurchaseError } from '../../src/purchase-error.js';

type PortCall =
  | { port: 'payment'; accountId: number; amount: number }
  | { port: 'reservation'; accountId: number; seats: number };

let accountId: number;
let requests: TicketTypeRequest[];
let calls: PortCall[];
let error: InvalidPurchaseError | null;
let service: TicketServiceImpl;

Before(function () {
  accountId = 0;
  requests = [];
  calls = [];
  error = null;
  service = new TicketServiceImpl(
    {
      makePayment: (id, amount) => {
        calls.push({ port: 'payment', accountId: id, amount });
      },
    },
    {
      reserveSeat: (id, seats) => {
        calls.push({ port: 'reservation', accountId: id, seats });
      },
    },
    pino({ level: 'silent' })
  );
});

// --- Given steps ---

Given('account {int}', function (id: number) {
  accountId = id;
});

Given('a request for {int} {word} tickets', function (quantity: number, type: string) {
  assert(isTicketType(type), `Unknown ticket type: ${type}`);
  requests.push(new TicketTypeRequest(type, quantity));
});

// --- When steps ---

When('I purchase the tickets', function () {
  try {
    service.purchaseTickets(accountId, requests);
    error = null;
  } catch (e) {
    if (!(e instanceof InvalidPurchaseError)) {
      throw e;
    }
    error = e;
  }
});

// --- Then steps ---

Then('a payment of {int} is made for account {int}', function (amount: number, id: number) {
  assert(error === null, `Expected purchase to succeed but got: ${error?.message}`);
  const payments = calls.filter((call) => call.port === 'payment');
  assert.deepStrictEqual(payments, [{ port: 'payment', accountId: id, amount }]);
});

Then('{int} seats are reserved for account {int}', function (seats: number, id: number) {
  assert(error === null, `Expected purchase to succeed but got: ${error?.message}`);
  const reservations = calls.filter((call) => call.port === 'reservation');
  assert.deepStrictEqual(reservations, [{ port: 'reservation', accountId: id, seats }]);
});

Then('the payment is made before the reservation', function () {
  assert.deepStrictEqual(
    calls.map((call) => call.port),
    ['payment', 'reservation']
  );
});

Then('the purchase fails with code {string}', function (codeName: string) {
  assert(error !== null, 'Expected purchase to fail but it succeeded');
  assert.strictEqual<string>(error.errorCode, codeName, `Expected code ${codeName}`);
});

Then('the error message contains {string}', function (substring: string) {
  assert(error !== null, 'Expected error but purchase succeeded');
  assert(
    error.message.includes(substring),
    `Expected error message to contain '${substring}' but was '${error.message}'`
  );
});

Then('no payment is made', function () {
  assert.strictEqual(calls.filter((call) => call.port === 'payment').length, 0);
});

Then('no seats are reserved', function () {
  assert.strictEqual(calls.filter((call) => call.port === 'reservation').length, 0);
});
