import type { Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { ContactService } from '../../services/ContactService';
import type { Contact } from '../../models/Contact';
import type { ContactResponse } from '../../types';
import {
  contactBodySchema,
  contactIdParamSchema,
  contactListQuerySchema,
  contactSearchParamSchema,
} from '../../schemas';

const toResponse = (contacts: Contact[]): ContactResponse[] =>
  contacts.map(contact => contact.toApiResponse());

/**
 * Controller for the /contacts endpoints
 * Every call is scoped to the authenticated user
 */
export class ContactController extends BaseController {
  constructor(
    private contactService: ContactService,
    private clock: () => Date = () => new Date()
  ) {
    super();
  }

  /**
   * GET /contacts
   */
  getContacts = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const { limit, offset } = this.parse(contactListQuerySchema, req.query);

    const contacts = await this.contactService.listContacts(limit, offset, user, req.traceId);
    this.success(res, toResponse(contacts));
  });

  /**
   * GET /contacts/{contactId}
   */
  getContactById = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const { contactId } = this.parse(contactIdParamSchema, req.params);

    const contact = await this.contactService.getContact(contactId, user, req.traceId);
    this.success(res, contact.toApiResponse());
  });

  /**
   * POST /contacts
   */
  createContact = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const fields = this.parse(contactBodySchema, req.body);

    const contact = await this.contactService.createContact(fields, user, req.traceId);
    this.success(res, contact.toApiResponse(), 201);
  });

  /**
   * PUT /contacts/{contactId}
   */
  updateContact = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const { contactId } = this.parse(contactIdParamSchema, req.params);
    const fields = this.parse(contactBodySchema, req.body);

    const contact = await this.contactService.updateContact(contactId, fields, user, req.traceId);
    this.success(res, contact.toApiResponse());
  });

  /**
   * DELETE /contacts/{contactId}
   */
  deleteContact = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const { contactId } = this.parse(contactIdParamSchema, req.params);

    const contact = await this.contactService.removeContact(contactId, user, req.traceId);
    this.success(res, contact.toApiResponse());
  });

  /**
   * GET /contacts/search/{contactValue}
   */
  searchContacts = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);
    const { contactValue } = this.parse(contactSearchParamSchema, req.params);

    const contacts = await this.contactService.searchContacts(contactValue, user, req.traceId);
    this.success(res, toResponse(contacts));
  });

  /**
   * GET /contacts/birthday/next-week
   */
  getUpcomingBirthdays = this.handle(async (req: Request, res: Response) => {
    const user = this.requireUser(req);

    const contacts = await this.contactService.getUpcomingBirthdays(
      user,
      req.traceId,
      this.clock()
    );
    this.success(res, toResponse(contacts));
  });
}
