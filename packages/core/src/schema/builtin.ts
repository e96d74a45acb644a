/**
 * Built-in table schemas served without introspection.
 */

import { createSchemaDescriptor, type SchemaDescriptor } from './types.js';

export const SALES_DATA_TABLE = 'sales_data';

const SALES_DATA = createSchemaDescriptor([
  { name: 'Product_ID', type: 'Int64', description: 'Unique identifier for products' },
  { name: 'Sale_Date', type: 'Date', description: 'Date of the sale' },
  { name: 'Sales_Rep', type: 'String', description: 'Name of the sales representative' },
  { name: 'Region', type: 'String', description: 'Geographic region of the sale' },
  { name: 'Sales_Amount', type: 'Float64', description: 'Total amount of the sale' },
  { name: 'Quantity_Sold', type: 'Int64', description: 'Number of units sold' },
  { name: 'Product_Category', type: 'String', description: 'Category of the product' },
  { name: 'Unit_Cost', type: 'Float64', description: 'Cost per unit' },
  { name: 'Unit_Price', type: 'Float64', description: 'Price per unit' },
  { name: 'Customer_Type', type: 'String', description: 'Type of customer (Retail, Wholesale, etc.)' },
  { name: 'Discount', type: 'Float64', description: 'Discount percentage applied' },
  { name: 'Payment_Method', type: 'String', description: 'Method of payment' },
  { name: 'Sales_Channel', type: 'String', description: 'Channel through which sale was made' },
  { name: 'Region_and_Sales_Rep', type: 'String', description: 'Combination of region and sales rep' },
]);

export const BUILTIN_SCHEMAS: ReadonlyMap<string, SchemaDescriptor> = new Map([[SALES_DATA_TABLE, SALES_DATA]]);
