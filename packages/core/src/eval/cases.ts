/**
 * Built-in regression cases over the `order_items` datasource.
 */

import type { EvalCase } from './types.js';

const FIXED_REFERENCE_TIME = '2024-06-15T12:00:00Z';

export function defaultEvalCases(): EvalCase[] {
  return [
    {
      name: 'count_all',
      question: 'Count all items',
      referenceSql: 'SELECT COUNT(*) FROM order_items;',
    },
    {
      name: 'total_revenue',
      question: 'What is the total revenue?',
      referenceSql: 'SELECT SUM(price) FROM order_items;',
    },
    {
      name: 'avg_shipping',
      question: 'What is the average shipping cost?',
      referenceSql: 'SELECT AVG(freight_value) FROM order_items;',
    },
    {
      name: 'count_expensive',
      question: 'How many items cost more than 100?',
      referenceSql: 'SELECT COUNT(*) FROM order_items WHERE price > 100;',
    },
    {
      name: 'revenue_last_7_days',
      question: 'What is the total revenue from items with shipping limit date in the last 7 days?',
      referenceSql: "SELECT SUM(price) FROM order_items WHERE shipping_limit_date > '2024-06-08 12:00:00';",
      referenceTime: FIXED_REFERENCE_TIME,
    },
    {
      name: 'unsupported_weather',
      question: "What's the weather like in Tokyo?",
      expectUnsupported: true,
    },
    {
      name: 'unsupported_nonexistent_table',
      question: 'How many customers are from California?',
      expectUnsupported: true,
    },
  ];
}
